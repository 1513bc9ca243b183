// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { EmptyTextError } from '@/lib/errors'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'

const summaryRequestSchema = z.object({
  text: z.string().default(''),
})

export function createSummaryHandler({
  summarizer,
}: Pick<StudyServices, 'summarizer'>): RouteHandler {
  return async (req) => {
    try {
      const { text } = await parseJsonBody(req, summaryRequestSchema)
      if (!text) {
        throw new EmptyTextError()
      }

      const summary = summarizer.summarize(text)

      return successResponse({ summary }, 'Summary generated')
    } catch (error) {
      return routeErrorResponse(error, 'summary')
    }
  }
}
