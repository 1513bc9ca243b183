// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { z } from 'zod'
import { InvalidRequestError } from '@/lib/errors'
import { errorHandler } from './error-handler'

/**
 * Reads the JSON body of a request and validates it against a zod schema.
 * An empty body is treated as `{}` so that every field falls back to its default.
 */
export async function parseJsonBody<Schema extends z.ZodTypeAny>(
  req: Request,
  schema: Schema,
): Promise<z.output<Schema>> {
  const raw = await req.text()

  let body: unknown = {}
  if (raw.trim()) {
    try {
      body = JSON.parse(raw)
    } catch (error) {
      throw new InvalidRequestError('Request body must be valid JSON', error)
    }
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    throw new InvalidRequestError(`Invalid request: ${errorHandler(result.error)}`, result.error)
  }
  return result.data
}
