// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { successResponse, type RouteHandler } from '@/lib/api-response'
import { DEFAULT_SUBJECT } from '@/lib/config/constants'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'

const resourcesRequestSchema = z.object({
  subject: z.string().min(1).default(DEFAULT_SUBJECT),
})

export function createResourcesHandler({
  resourceSuggester,
}: Pick<StudyServices, 'resourceSuggester'>): RouteHandler {
  return async (req) => {
    try {
      const { subject } = await parseJsonBody(req, resourcesRequestSchema)
      const resources = resourceSuggester.suggestResources(subject)

      return successResponse({ resources }, 'Resources found')
    } catch (error) {
      return routeErrorResponse(error, 'resources')
    }
  }
}
