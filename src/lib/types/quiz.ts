// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export const DIFFICULTY_LABELS = ['Easy', 'Medium'] as const

export type DifficultyLabel = (typeof DIFFICULTY_LABELS)[number]

/** Requested difficulty: one label, or 'Mixed' for no filtering */
export type QuizDifficulty = DifficultyLabel | 'Mixed'

export type OptionLetter = 'A' | 'B' | 'C' | 'D'

export interface DifficultyPrediction {
  label: DifficultyLabel
  /** Probability of the predicted label, in [0.5, 1] */
  confidence: number
}

export interface DifficultyClassifier {
  classify(question: string): DifficultyPrediction
}

export interface QuizOptions {
  A: string
  B: string
  C: string
  D: string
  correct: OptionLetter
}

export interface QuizQuestion {
  question: string
  difficulty: DifficultyLabel
  confidence: number
  options: QuizOptions
}
