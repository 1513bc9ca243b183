// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { ScenarioInfo, ScenarioKey } from '@/lib/types/study-plan'

export const SCENARIOS: Readonly<Record<ScenarioKey, Readonly<ScenarioInfo>>> = {
  exam_prep: {
    intensity: 'high',
    focus: 'comprehensive review and practice',
    frequency: 'daily',
  },
  homework: {
    intensity: 'medium',
    focus: 'specific topics and problem-solving',
    frequency: 'as needed',
  },
  project: {
    intensity: 'medium',
    focus: 'research and application',
    frequency: 'regular',
  },
}

export const FALLBACK_SCENARIO: ScenarioKey = 'exam_prep'

export const isScenarioKey = (key: string): key is ScenarioKey =>
  Object.prototype.hasOwnProperty.call(SCENARIOS, key)

// Unknown scenario names get the exam_prep profile rather than an error
export function lookupScenario(key: string): Readonly<ScenarioInfo> {
  return isScenarioKey(key) ? SCENARIOS[key] : SCENARIOS[FALLBACK_SCENARIO]
}
