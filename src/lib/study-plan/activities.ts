// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import activityData from '@/data/activities.json'
import { SubjectCatalog } from '@/lib/catalog/subject-catalog'

// Each subject lists five steps: review, practice, challenge, assessment, consolidation
const activityCatalog = SubjectCatalog.fromJson(activityData, 'activity')

export function activitiesFor(subject: string): readonly string[] {
  return activityCatalog.get(subject)
}

/** Activity for a 1-based day; the list repeats once every step has been used. */
export function activityForDay(subject: string, day: number): string {
  const activities = activitiesFor(subject)
  const index = (((day - 1) % activities.length) + activities.length) % activities.length
  return activities[index]
}
