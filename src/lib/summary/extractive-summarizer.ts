// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { SUMMARY_COMPRESSION_RATIO } from '@/lib/config/constants'
import { EmptyTextError } from '@/lib/errors'

/**
 * Indices of the sentences to keep out of `total`, ascending.
 *
 * The first and last sentences anchor the summary; longer summaries add
 * sentences at an even stride from the second one onwards and are then cut
 * back to `keep`.
 */
export function selectSentenceIndices(total: number, keep: number): number[] {
  if (total <= keep) {
    return Array.from({ length: total }, (_, index) => index)
  }

  if (keep <= 2) {
    return [0, total - 1].slice(0, keep)
  }

  const step = Math.max(1, Math.floor(total / (keep - 2)))
  const indices = new Set<number>([0])
  for (let index = 1; index < total - 1; index += step) {
    indices.add(index)
  }
  indices.add(total - 1)

  return [...indices].sort((a, b) => a - b).slice(0, keep)
}

export class TextSummarizer {
  constructor(private readonly compressionRatio: number = SUMMARY_COMPRESSION_RATIO) {}

  /**
   * Picks a subset of the text's sentences. Sentences are split on '.', so
   * abbreviations and decimals also end a sentence.
   */
  summarize(text: string, compressionRatio: number = this.compressionRatio): string {
    const sentences = text
      .split('.')
      .map((sentence) => sentence.trim())
      .filter(Boolean)

    if (sentences.length === 0) {
      throw new EmptyTextError()
    }

    const keep = Math.max(1, Math.floor(sentences.length * compressionRatio))
    const selected = selectSentenceIndices(sentences.length, keep).map((index) => sentences[index])

    return `${selected.join('. ')}.`
  }
}
