// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { successResponse, type RouteHandler } from '@/lib/api-response'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'
import { generateStudyPlan } from '@/lib/study-plan/generator'
import { studyPlanRequestSchema } from '@/lib/study-plan/request-schema'
import { logStudyDebug } from '@/lib/utils/debug'

export function createStudyPlanHandler({ clock }: Pick<StudyServices, 'clock'>): RouteHandler {
  return async (req) => {
    try {
      const request = await parseJsonBody(req, studyPlanRequestSchema)
      logStudyDebug('study-plan', 'Data from request:', request)

      const plan = generateStudyPlan(request, clock())
      console.log(`[study-plan] Generated ${plan.totalDays}-day ${plan.subject} plan`)

      return successResponse(plan, 'Study plan generated')
    } catch (error) {
      return routeErrorResponse(error, 'study-plan')
    }
  }
}
