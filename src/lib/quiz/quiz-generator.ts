// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import templateData from '@/data/quiz-templates.json'
import { SubjectCatalog } from '@/lib/catalog/subject-catalog'
import { DEFAULT_QUIZ_QUESTIONS } from '@/lib/config/constants'
import type {
  DifficultyClassifier,
  DifficultyPrediction,
  OptionLetter,
  QuizDifficulty,
  QuizOptions,
  QuizQuestion,
} from '@/lib/types/quiz'
import { logStudyDebug } from '@/lib/utils/debug'
import { pickOne, sampleWithoutReplacement, shuffle, type Random } from '@/lib/utils/random'

// Correct answer keyed by the first word of the question
const CORRECT_ANSWERS: ReadonlyMap<string, string> = new Map([
  ['What', 'A fundamental concept'],
  ['Explain', 'A detailed process'],
  ['Describe', 'A comprehensive overview'],
  ['How', 'A step-by-step method'],
])
const DEFAULT_CORRECT_ANSWER = 'The correct answer'

const DISTRACTORS = ['An incorrect interpretation', 'A false assumption', 'A common misconception']

const OPTION_LETTERS: readonly OptionLetter[] = ['A', 'B', 'C', 'D']

export class QuizGenerator {
  private readonly templates: SubjectCatalog<readonly string[]>

  constructor(
    private readonly classifier: DifficultyClassifier,
    private readonly random: Random,
    templates?: SubjectCatalog<readonly string[]>,
  ) {
    this.templates = templates ?? SubjectCatalog.fromJson(templateData, 'quiz template')
  }

  classifyDifficulty(question: string): DifficultyPrediction {
    return this.classifier.classify(question)
  }

  /**
   * Draws up to `numQuestions` distinct templates for the subject, keeping the
   * ones matching `difficulty` (all of them for 'Mixed'). When that leaves the
   * quiz short it is topped up with templates drawn with replacement, whatever
   * their difficulty.
   */
  generateQuiz(
    subject: string,
    numQuestions: number = DEFAULT_QUIZ_QUESTIONS,
    difficulty: QuizDifficulty = 'Mixed',
  ): QuizQuestion[] {
    const questions = this.templates.get(subject)
    const quiz: QuizQuestion[] = []

    for (const question of sampleWithoutReplacement(questions, numQuestions, this.random)) {
      const item = this.buildQuestion(question)
      if (difficulty !== 'Mixed' && item.difficulty !== difficulty) continue
      quiz.push(item)
    }

    logStudyDebug('quiz', `${quiz.length} of ${numQuestions} questions matched ${difficulty}`)

    while (quiz.length < numQuestions) {
      quiz.push(this.buildQuestion(pickOne(questions, this.random)))
    }

    return quiz.slice(0, Math.max(0, numQuestions))
  }

  generateOptions(question: string): QuizOptions {
    const firstWord = question.trim().split(/\s+/)[0] ?? ''
    const correct = CORRECT_ANSWERS.get(firstWord) ?? DEFAULT_CORRECT_ANSWER
    const [a, b, c, d] = shuffle([correct, ...DISTRACTORS], this.random)

    return {
      A: a,
      B: b,
      C: c,
      D: d,
      correct: OPTION_LETTERS[[a, b, c, d].indexOf(correct)],
    }
  }

  private buildQuestion(question: string): QuizQuestion {
    const { label, confidence } = this.classifyDifficulty(question)
    return {
      question,
      difficulty: label,
      confidence,
      options: this.generateOptions(question),
    }
  }
}
