// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import trainingData from '@/data/difficulty-training.json'
import { bagOfWords, ENGLISH_STOPWORDS } from '@/lib/nlp/tokenize'
import {
  DIFFICULTY_LABELS,
  type DifficultyClassifier,
  type DifficultyLabel,
  type DifficultyPrediction,
} from '@/lib/types/quiz'

export type DifficultyTrainingSet = Record<DifficultyLabel, string[]>

const trainingSetSchema = z.object({
  Easy: z.array(z.string()).min(1),
  Medium: z.array(z.string()).min(1),
})

export const DEFAULT_DIFFICULTY_TRAINING: DifficultyTrainingSet =
  trainingSetSchema.parse(trainingData)

interface LabelModel {
  label: DifficultyLabel
  logPrior: number
  wordCounts: Map<string, number>
  totalWords: number
}

/**
 * Multinomial naive Bayes over a bag of words with add-one smoothing. It is
 * trained once, on construction, from a handful of labelled questions.
 * Words never seen in training are ignored; ties go to 'Easy'.
 */
export class NaiveBayesDifficultyClassifier implements DifficultyClassifier {
  private readonly vocabulary = new Set<string>()
  private readonly models: LabelModel[]

  constructor(
    examples: DifficultyTrainingSet = DEFAULT_DIFFICULTY_TRAINING,
    private readonly stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS,
  ) {
    const exampleCount = DIFFICULTY_LABELS.reduce((sum, label) => sum + examples[label].length, 0)

    this.models = DIFFICULTY_LABELS.map((label) => {
      const wordCounts = new Map<string, number>()
      let totalWords = 0
      for (const question of examples[label]) {
        for (const word of bagOfWords(question, this.stopwords)) {
          wordCounts.set(word, (wordCounts.get(word) ?? 0) + 1)
          this.vocabulary.add(word)
          totalWords++
        }
      }
      return {
        label,
        logPrior: Math.log(examples[label].length / exampleCount),
        wordCounts,
        totalWords,
      }
    })
  }

  classify(question: string): DifficultyPrediction {
    const words = bagOfWords(question, this.stopwords).filter((word) => this.vocabulary.has(word))
    const vocabularySize = this.vocabulary.size

    const scores = this.models.map(
      (model) =>
        model.logPrior +
        words.reduce(
          (sum, word) =>
            sum +
            Math.log(((model.wordCounts.get(word) ?? 0) + 1) / (model.totalWords + vocabularySize)),
          0,
        ),
    )

    // Normalise in log space before exponentiating
    const maxScore = Math.max(...scores)
    const weights = scores.map((score) => Math.exp(score - maxScore))
    const total = weights.reduce((sum, weight) => sum + weight, 0)

    let best = 0
    for (let i = 1; i < weights.length; i++) {
      if (weights[i] > weights[best]) best = i
    }

    return { label: this.models[best].label, confidence: weights[best] / total }
  }
}
