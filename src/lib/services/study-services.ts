// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { SUMMARY_COMPRESSION_RATIO } from '@/lib/config/constants'
import { FeedbackGenerator } from '@/lib/feedback/feedback-generator'
import { TextAnalyzer } from '@/lib/nlp/text-analyzer'
import { NaiveBayesDifficultyClassifier } from '@/lib/quiz/difficulty-classifier'
import { QuizGenerator } from '@/lib/quiz/quiz-generator'
import { ResourceSuggester } from '@/lib/resources/resource-suggester'
import { TextSummarizer } from '@/lib/summary/extractive-summarizer'
import { StudyTipsGenerator } from '@/lib/tips/study-tips'
import type { DifficultyClassifier } from '@/lib/types/quiz'
import type { Random } from '@/lib/utils/random'

export type Clock = () => Date

export interface StudyServices {
  clock: Clock
  quizGenerator: QuizGenerator
  resourceSuggester: ResourceSuggester
  summarizer: TextSummarizer
  feedbackGenerator: FeedbackGenerator
  tipsGenerator: StudyTipsGenerator
  textAnalyzer: TextAnalyzer
}

export interface StudyServiceOptions {
  random?: Random
  clock?: Clock
  classifier?: DifficultyClassifier
  compressionRatio?: number
}

/**
 * Builds every generator once. Route handlers receive the result instead of
 * constructing or looking up generators themselves.
 */
export function createStudyServices(options: StudyServiceOptions = {}): StudyServices {
  const random = options.random ?? Math.random
  const classifier = options.classifier ?? new NaiveBayesDifficultyClassifier()

  return {
    clock: options.clock ?? (() => new Date()),
    quizGenerator: new QuizGenerator(classifier, random),
    resourceSuggester: new ResourceSuggester(),
    summarizer: new TextSummarizer(options.compressionRatio ?? SUMMARY_COMPRESSION_RATIO),
    feedbackGenerator: new FeedbackGenerator(random),
    tipsGenerator: new StudyTipsGenerator(),
    textAnalyzer: new TextAnalyzer(),
  }
}
