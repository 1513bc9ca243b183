// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { STUDY_RANDOM_SEED } from '@/lib/config/constants'
import { createSeededRandom } from '@/lib/utils/random'
import { createStudyServices } from './study-services'

export * from './study-services'

// Process-wide instance the route modules bind to
export const studyServices = createStudyServices({
  random: STUDY_RANDOM_SEED === undefined ? undefined : createSeededRandom(STUDY_RANDOM_SEED),
})

console.log(
  '[Study Services] initialized',
  STUDY_RANDOM_SEED === undefined ? '(random)' : `(seed ${STUDY_RANDOM_SEED})`,
)
