// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import stopwordData from '@/data/stopwords.json'

export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(stopwordData),
)

let wordSegmenter: Intl.Segmenter | undefined
let sentenceSegmenter: Intl.Segmenter | undefined

const getWordSegmenter = () => {
  if (!wordSegmenter) {
    wordSegmenter = new Intl.Segmenter('en', { granularity: 'word' })
  }
  return wordSegmenter
}

const getSentenceSegmenter = () => {
  if (!sentenceSegmenter) {
    sentenceSegmenter = new Intl.Segmenter('en', { granularity: 'sentence' })
  }
  return sentenceSegmenter
}

/** Sentences as the segmenter finds them, trimmed, without blank ones. */
export function splitSentences(text: string): string[] {
  const sentences: string[] = []
  for (const { segment } of getSentenceSegmenter().segment(text)) {
    const sentence = segment.trim()
    if (sentence) sentences.push(sentence)
  }
  return sentences
}

/**
 * Every non-whitespace token, punctuation included ("Cells divide." gives
 * "Cells", "divide", ".").
 */
export function splitTokens(text: string): string[] {
  const tokens: string[] = []
  for (const { segment } of getWordSegmenter().segment(text)) {
    if (segment.trim()) tokens.push(segment)
  }
  return tokens
}

/**
 * Lowercase word features for bag-of-words models: runs of two or more
 * letters or digits, minus stopwords.
 */
export function bagOfWords(text: string, stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS) {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]{2,}/gu) ?? []
  return words.filter((word) => !stopwords.has(word))
}
