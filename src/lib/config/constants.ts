// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

const parseIntEnv = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

// Configuration constants
export const STUDY_DEBUG_LOGS = process.env.STUDY_DEBUG_LOGS === 'true'

// Unset means the generators draw from Math.random
export const STUDY_RANDOM_SEED: number | undefined = (() => {
  const seed = Number.parseInt(process.env.STUDY_RANDOM_SEED ?? '', 10)
  return Number.isNaN(seed) ? undefined : seed
})()

export const SUMMARY_COMPRESSION_RATIO = (() => {
  const ratio = Number.parseFloat(process.env.SUMMARY_COMPRESSION_RATIO || '0.3')
  return Number.isNaN(ratio) || ratio <= 0 || ratio > 1 ? 0.3 : ratio
})()

export const QUIZ_MAX_QUESTIONS = Math.max(1, parseIntEnv(process.env.QUIZ_MAX_QUESTIONS, 20))
export const MAX_PLAN_DAYS = Math.max(1, parseIntEnv(process.env.MAX_PLAN_DAYS, 365))
export const MAX_PLAN_HOURS = Math.max(1, parseIntEnv(process.env.MAX_PLAN_HOURS, 1000))

// Study sessions are laid out from 9:00 in one-hour blocks
export const SESSION_START_HOUR = 9
export const SESSION_DURATION_LABEL = '1 hour'

// Request defaults
export const DEFAULT_SUBJECT = 'Mathematics'
export const DEFAULT_SCENARIO = 'exam_prep'
export const DEFAULT_STUDY_HOURS = 5
export const DEFAULT_STUDY_DAYS = 5
export const DEFAULT_QUIZ_QUESTIONS = 5
export const DEFAULT_FEEDBACK_SCORE = 50
export const DEFAULT_FEEDBACK_SUBJECT = 'General'
export const DEFAULT_TIP_COUNT = 3
export const DEFAULT_KEYWORD_COUNT = 5

// Full study sessions bundle a fixed-size quiz and tip list
export const SESSION_QUIZ_QUESTIONS = 5
export const SESSION_TIP_COUNT = 3
