// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export type FeedbackCategory = 'excellent' | 'good' | 'fair' | 'needs_improvement'

export interface ScoreEntry {
  score: number
  subject: string
}
