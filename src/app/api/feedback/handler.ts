// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { DEFAULT_FEEDBACK_SCORE, DEFAULT_FEEDBACK_SUBJECT } from '@/lib/config/constants'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'

const feedbackRequestSchema = z.object({
  score: z.coerce.number().finite().default(DEFAULT_FEEDBACK_SCORE),
  subject: z.string().min(1).default(DEFAULT_FEEDBACK_SUBJECT),
})

export function createFeedbackHandler({
  feedbackGenerator,
}: Pick<StudyServices, 'feedbackGenerator'>): RouteHandler {
  return async (req) => {
    try {
      const { score, subject } = await parseJsonBody(req, feedbackRequestSchema)
      const feedback = feedbackGenerator.generateFeedback(score, subject)

      return successResponse({ feedback }, 'Feedback generated')
    } catch (error) {
      return routeErrorResponse(error, 'feedback')
    }
  }
}
