// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { STUDY_DEBUG_LOGS } from '@/lib/config/constants'

// Utility function for conditional debug logging related to study workflows
export const logStudyDebug = (scope: string, ...args: unknown[]) => {
  if (!STUDY_DEBUG_LOGS) return
  console.debug(`[${scope}]`, ...args)
}
