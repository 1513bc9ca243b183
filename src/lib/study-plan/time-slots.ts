// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { SESSION_DURATION_LABEL, SESSION_START_HOUR } from '@/lib/config/constants'
import type { TimeSlot } from '@/lib/types/study-plan'

/**
 * Splits a day's study budget into whole one-hour sessions starting at `startHour`.
 *
 * Only whole hours become slots: 3.7 hours yields three sessions and the
 * remaining 0.7 hours is not shown. Hours are not wrapped past midnight, so a
 * 16-hour day ends with "24:00 - 25:00".
 */
export function partitionTimeSlots(
  dailyHours: number,
  startHour: number = SESSION_START_HOUR,
): TimeSlot[] {
  if (!Number.isFinite(dailyHours) || dailyHours < 1) {
    return []
  }

  const count = Math.floor(dailyHours)
  return Array.from({ length: count }, (_, index) => {
    const hour = startHour + index
    return {
      label: `${hour}:00 - ${hour + 1}:00`,
      duration: SESSION_DURATION_LABEL,
      activity: `Study session ${index + 1}`,
    }
  })
}
