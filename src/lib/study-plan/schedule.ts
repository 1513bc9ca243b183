// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { DaySchedule, StudyPlanRequest } from '@/lib/types/study-plan'
import { addDays, formatDate, roundTo } from '@/lib/utils'
import { activityForDay } from './activities'
import { partitionTimeSlots } from './time-slots'
import { assertValidDayCount, assertValidHours } from './validation'

/**
 * Spreads the requested hours evenly over the requested days.
 *
 * Every day gets the same share (`hours / days`, shown rounded to one decimal),
 * the activity for its position in the subject's cycle, and one-hour time slots
 * for the whole hours of its share. Dates count up from `anchor`, which is read
 * once so a build never straddles two "todays".
 */
export function buildSchedule(
  { subject, hours, days }: Pick<StudyPlanRequest, 'subject' | 'hours' | 'days'>,
  anchor: Date,
): DaySchedule[] {
  assertValidDayCount(days)
  assertValidHours(hours)

  const dailyHours = hours / days
  const displayHours = roundTo(dailyHours, 1)
  const startDay = addDays(anchor, 0)

  const schedule: DaySchedule[] = []
  for (let day = 1; day <= days; day++) {
    schedule.push({
      day,
      date: formatDate(addDays(startDay, day - 1)),
      hours: displayHours,
      activity: activityForDay(subject, day),
      timeSlots: partitionTimeSlots(dailyHours),
    })
  }

  return schedule
}
