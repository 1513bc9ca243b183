// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { InvalidDayCountError, InvalidHoursError } from '@/lib/errors'

export function assertValidDayCount(days: number): void {
  if (!Number.isInteger(days) || days < 1) {
    throw new InvalidDayCountError(days)
  }
}

export function assertValidHours(hours: number): void {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new InvalidHoursError(hours)
  }
}
