// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { attachmentResponse, type RouteHandler } from '@/lib/api-response'
import { routeErrorResponse } from '@/lib/handler/error-handler'
import { parseJsonBody } from '@/lib/handler/request-body'
import type { StudyServices } from '@/lib/services/study-services'
import { exportFilename, toCsv } from '@/lib/study-plan/export'
import { flattenForExport, generateStudyPlan } from '@/lib/study-plan/generator'
import { studyPlanRequestSchema } from '@/lib/study-plan/request-schema'

export function createPlanDownloadHandler({ clock }: Pick<StudyServices, 'clock'>): RouteHandler {
  return async (req) => {
    try {
      const request = await parseJsonBody(req, studyPlanRequestSchema)
      const now = clock()

      const plan = generateStudyPlan(request, now)
      const rows = flattenForExport(plan)
      const filename = exportFilename(plan.subject, now)
      console.log(`[study-plan] Exporting ${rows.length} rows to ${filename}`)

      return attachmentResponse(toCsv(rows), filename, 'text/csv; charset=utf-8')
    } catch (error) {
      return routeErrorResponse(error, 'study-plan/download-csv')
    }
  }
}
