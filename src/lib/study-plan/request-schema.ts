// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import {
  DEFAULT_SCENARIO,
  DEFAULT_STUDY_DAYS,
  DEFAULT_STUDY_HOURS,
  DEFAULT_SUBJECT,
  MAX_PLAN_DAYS,
  MAX_PLAN_HOURS,
} from '@/lib/config/constants'

// Range checks on hours and days belong to the schedule builder, which reports
// them as INVALID_HOURS / INVALID_DAY_COUNT; the schema only coerces and caps.
export const studyPlanRequestSchema = z.object({
  subject: z.string().min(1).default(DEFAULT_SUBJECT),
  hours: z.coerce.number().max(MAX_PLAN_HOURS).default(DEFAULT_STUDY_HOURS),
  scenario: z.string().min(1).default(DEFAULT_SCENARIO),
  days: z.coerce.number().max(MAX_PLAN_DAYS).default(DEFAULT_STUDY_DAYS),
})

export type StudyPlanRequestBody = z.infer<typeof studyPlanRequestSchema>
