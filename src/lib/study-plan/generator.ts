// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { DEFAULT_STUDY_DAYS } from '@/lib/config/constants'
import type { StudyPlan, StudyPlanExportRow, StudyPlanRequest } from '@/lib/types/study-plan'
import { formatDate } from '@/lib/utils'
import { logStudyDebug } from '@/lib/utils/debug'
import { lookupScenario } from './scenarios'
import { buildSchedule } from './schedule'

export type StudyPlanInput = Omit<StudyPlanRequest, 'days'> & { days?: number }

/**
 * Builds a complete study plan for the given request.
 *
 * `now` is the reference time for the plan's start date; callers pass it in so
 * that the same request always yields the same plan.
 */
export function generateStudyPlan(input: StudyPlanInput, now: Date): StudyPlan {
  const days = input.days ?? DEFAULT_STUDY_DAYS
  const scenarioInfo = lookupScenario(input.scenario)

  logStudyDebug('study-plan', 'Generating plan:', { ...input, days })

  const schedule = buildSchedule({ subject: input.subject, hours: input.hours, days }, now)

  return {
    subject: input.subject,
    totalHours: input.hours,
    totalDays: days,
    scenario: input.scenario,
    intensity: scenarioInfo.intensity,
    focus: scenarioInfo.focus,
    startDate: formatDate(now),
    schedule,
  }
}

/**
 * Flattens a plan into one row per (day, time slot). Days without a whole hour
 * of study have no slots and contribute no rows.
 */
export function flattenForExport(plan: StudyPlan): StudyPlanExportRow[] {
  return plan.schedule.flatMap((day) =>
    day.timeSlots.map((slot) => ({
      date: day.date,
      day: `Day ${day.day}`,
      time: slot.label,
      activity: day.activity,
      duration: slot.duration,
      subject: plan.subject,
      scenario: plan.scenario,
    })),
  )
}
