// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { EmptyTextError } from '@/lib/errors'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'

const analysisRequestSchema = z.object({
  text: z.string().default(''),
})

export function createTextAnalysisHandler({
  textAnalyzer,
}: Pick<StudyServices, 'textAnalyzer'>): RouteHandler {
  return async (req) => {
    try {
      const { text } = await parseJsonBody(req, analysisRequestSchema)
      if (!text) {
        throw new EmptyTextError()
      }

      return successResponse(textAnalyzer.analyzeText(text), 'Text analyzed')
    } catch (error) {
      return routeErrorResponse(error, 'analyze-text')
    }
  }
}
