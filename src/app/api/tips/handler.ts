// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { DEFAULT_SUBJECT, DEFAULT_TIP_COUNT } from '@/lib/config/constants'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'

const tipsRequestSchema = z.object({
  subject: z.string().min(1).default(DEFAULT_SUBJECT),
  numTips: z.coerce.number().int().min(0).default(DEFAULT_TIP_COUNT),
})

export function createTipsHandler({
  tipsGenerator,
}: Pick<StudyServices, 'tipsGenerator'>): RouteHandler {
  return async (req) => {
    try {
      const { subject, numTips } = await parseJsonBody(req, tipsRequestSchema)
      const tips = tipsGenerator.generateTips(subject, numTips)

      return successResponse({ tips }, 'Study tips generated')
    } catch (error) {
      return routeErrorResponse(error, 'tips')
    }
  }
}
