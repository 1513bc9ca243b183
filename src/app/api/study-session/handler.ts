// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { SESSION_QUIZ_QUESTIONS, SESSION_TIP_COUNT } from '@/lib/config/constants'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'
import { generateStudyPlan } from '@/lib/study-plan/generator'
import { studyPlanRequestSchema } from '@/lib/study-plan/request-schema'
import { logStudyDebug } from '@/lib/utils/debug'

const studySessionRequestSchema = studyPlanRequestSchema.extend({
  text: z.string().default(''),
})

// Whitespace or bare periods leave the summarizer nothing to keep
const hasSentences = (text: string) => /[^\s.]/.test(text)

/**
 * Bundles everything a study session needs in one response: the plan, a quiz,
 * resources, tips and, when text is supplied, its summary.
 */
export function createStudySessionHandler(services: StudyServices): RouteHandler {
  return async (req) => {
    try {
      const { text, ...request } = await parseJsonBody(req, studySessionRequestSchema)
      logStudyDebug('study-session', 'Data from request:', { ...request, hasText: !!text })

      const now = services.clock()
      const plan = generateStudyPlan(request, now)

      const session = {
        subject: request.subject,
        hours: request.hours,
        days: request.days,
        scenario: request.scenario,
        plan,
        quiz: services.quizGenerator.generateQuiz(request.subject, SESSION_QUIZ_QUESTIONS),
        resources: services.resourceSuggester.suggestResources(request.subject),
        tips: services.tipsGenerator.generateTips(request.subject, SESSION_TIP_COUNT),
        summary: hasSentences(text) ? services.summarizer.summarize(text) : null,
        generatedAt: now.toISOString(),
      }

      return successResponse(session, 'Study session generated')
    } catch (error) {
      return routeErrorResponse(error, 'study-session')
    }
  }
}
