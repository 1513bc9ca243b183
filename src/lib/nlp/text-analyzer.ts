// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { DEFAULT_KEYWORD_COUNT } from '@/lib/config/constants'
import type { TextAnalysis } from '@/lib/types/text-analysis'
import { ENGLISH_STOPWORDS, splitSentences, splitTokens } from './tokenize'

const ALPHABETIC = /^\p{L}+$/u

export class TextAnalyzer {
  constructor(private readonly stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS) {}

  /**
   * Most frequent alphabetic, non-stopword tokens (lowercased). Equal counts
   * keep the order in which the words first appear.
   */
  extractKeywords(text: string, count: number = DEFAULT_KEYWORD_COUNT): string[] {
    const frequencies = new Map<string, number>()
    for (const token of splitTokens(text.toLowerCase())) {
      if (!ALPHABETIC.test(token) || this.stopwords.has(token)) continue
      frequencies.set(token, (frequencies.get(token) ?? 0) + 1)
    }

    // Array.prototype.sort is stable, so ties stay in first-seen order
    return [...frequencies.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, count))
      .map(([word]) => word)
  }

  analyzeText(text: string): TextAnalysis {
    const sentences = splitSentences(text)
    const tokens = splitTokens(text.toLowerCase())

    return {
      totalSentences: sentences.length,
      totalWords: tokens.length,
      uniqueWords: new Set(tokens).size,
      averageSentenceLength: sentences.length ? tokens.length / sentences.length : 0,
      keywords: this.extractKeywords(text),
    }
  }
}
