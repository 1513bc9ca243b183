// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { DEFAULT_QUIZ_QUESTIONS, DEFAULT_SUBJECT, QUIZ_MAX_QUESTIONS } from '@/lib/config/constants'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'
import { logStudyDebug } from '@/lib/utils/debug'

const quizRequestSchema = z.object({
  subject: z.string().min(1).default(DEFAULT_SUBJECT),
  numQuestions: z.coerce
    .number()
    .int()
    .min(1)
    .max(QUIZ_MAX_QUESTIONS)
    .default(DEFAULT_QUIZ_QUESTIONS),
  difficulty: z.enum(['Easy', 'Medium', 'Mixed']).default('Mixed'),
})

export function createQuizHandler({
  quizGenerator,
}: Pick<StudyServices, 'quizGenerator'>): RouteHandler {
  return async (req) => {
    try {
      const { subject, numQuestions, difficulty } = await parseJsonBody(req, quizRequestSchema)
      logStudyDebug('quiz', 'Data from request:', { subject, numQuestions, difficulty })

      const quiz = quizGenerator.generateQuiz(subject, numQuestions, difficulty)

      return successResponse({ quiz }, 'Quiz generated')
    } catch (error) {
      return routeErrorResponse(error, 'quiz')
    }
  }
}
