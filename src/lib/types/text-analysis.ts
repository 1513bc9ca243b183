// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export interface TextAnalysis {
  totalSentences: number
  totalWords: number
  uniqueWords: number
  averageSentenceLength: number
  keywords: string[]
}
