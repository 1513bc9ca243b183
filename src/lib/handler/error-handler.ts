// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { ZodError } from 'zod'
import { errorResponse } from '@/lib/api-response'
import { StudyError } from '@/lib/errors'

/**
 * Handles errors by returning a string representation of the error.
 *
 * @param error - The error to handle, which can be of any type.
 * @returns A string representation of the error.
 */
export function errorHandler(error: unknown): string {
  if (error == null) {
    return 'unknown error'
  }

  if (typeof error === 'string') {
    return error
  }

  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
  }

  if (error instanceof Error) {
    return error.message
  }

  return JSON.stringify(error)
}

/**
 * Maps an error thrown inside a route handler onto the standard error envelope.
 * Study errors are the caller's fault and answer with their own status; anything
 * else is logged and answers 500.
 */
export function routeErrorResponse(error: unknown, scope: string) {
  if (error instanceof StudyError) {
    return errorResponse(error.message, error, error.status)
  }

  console.error(`[${scope}] Unexpected error:`, error)
  return errorResponse(
    'Internal server error',
    { code: 'INTERNAL_ERROR', message: errorHandler(error) },
    500,
  )
}
