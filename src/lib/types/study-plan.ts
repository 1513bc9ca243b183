// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export type ScenarioKey = 'exam_prep' | 'homework' | 'project'

export type StudyIntensity = 'high' | 'medium'

export interface ScenarioInfo {
  intensity: StudyIntensity
  focus: string
  frequency: string
}

export interface TimeSlot {
  /** e.g. "9:00 - 10:00" */
  label: string
  duration: string
  /** e.g. "Study session 1" */
  activity: string
}

export interface DaySchedule {
  /** 1-based */
  day: number
  /** YYYY-MM-DD */
  date: string
  /** Daily share of the total hours, rounded to one decimal */
  hours: number
  activity: string
  timeSlots: TimeSlot[]
}

export interface StudyPlanRequest {
  subject: string
  hours: number
  /** Free-form; unknown keys resolve to the exam_prep scenario */
  scenario: string
  days: number
}

export interface StudyPlan {
  subject: string
  totalHours: number
  totalDays: number
  scenario: string
  intensity: StudyIntensity
  focus: string
  startDate: string
  schedule: DaySchedule[]
}

/** One row per (day, time slot) pair, used for tabular export */
export interface StudyPlanExportRow {
  date: string
  day: string
  time: string
  activity: string
  duration: string
  subject: string
  scenario: string
}
