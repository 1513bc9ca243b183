import { describe, expect, it } from 'vitest'
import type { DifficultyClassifier } from '@/lib/types/quiz'
import { createSeededRandom } from '@/lib/utils/random'
import { QuizGenerator } from './quiz-generator'

// Questions starting with "What" are easy, everything else is medium
const byFirstWord: DifficultyClassifier = {
  classify: (question) =>
    question.startsWith('What')
      ? { label: 'Easy', confidence: 0.9 }
      : { label: 'Medium', confidence: 0.8 },
}

const firstDraw = () => 0

describe('QuizGenerator.generateQuiz', () => {
  it('draws distinct templates and classifies them', () => {
    const quiz = new QuizGenerator(byFirstWord, firstDraw).generateQuiz('Mathematics', 3)

    expect(quiz.map((q) => q.question)).toEqual([
      'What is the fundamental theorem of algebra?',
      'Explain the concept of derivatives in calculus',
      'How do you solve quadratic equations?',
    ])
    expect(quiz.map((q) => [q.difficulty, q.confidence])).toEqual([
      ['Easy', 0.9],
      ['Medium', 0.8],
      ['Medium', 0.8],
    ])
  })

  it('drops questions of another difficulty and tops the quiz up with repeats', () => {
    const quiz = new QuizGenerator(byFirstWord, firstDraw).generateQuiz('Mathematics', 3, 'Easy')

    expect(quiz).toHaveLength(3)
    expect(new Set(quiz.map((q) => q.question))).toEqual(
      new Set(['What is the fundamental theorem of algebra?']),
    )
  })

  it('does not filter the top-up questions by difficulty', () => {
    const quiz = new QuizGenerator(byFirstWord, firstDraw).generateQuiz(
      'Mathematics',
      2,
      'Medium',
    )

    expect(quiz.map((q) => q.difficulty)).toEqual(['Medium', 'Easy'])
  })

  it('repeats templates when more questions are asked for than exist', () => {
    const quiz = new QuizGenerator(byFirstWord, firstDraw).generateQuiz('History', 10)

    expect(quiz).toHaveLength(10)
    expect(new Set(quiz.slice(0, 8).map((q) => q.question)).size).toBe(8)
    expect(quiz[9].question).toBe('What were the main causes of World War I?')
  })

  it('uses the Mathematics templates for unknown subjects', () => {
    const quiz = new QuizGenerator(byFirstWord, firstDraw).generateQuiz('Alchemy', 1)

    expect(quiz[0].question).toBe('What is the fundamental theorem of algebra?')
  })

  it('returns an empty quiz when no questions are requested', () => {
    expect(new QuizGenerator(byFirstWord, firstDraw).generateQuiz('Science', 0)).toEqual([])
  })

  it('never repeats a template within the first draw', () => {
    const quiz = new QuizGenerator(byFirstWord, createSeededRandom(2024)).generateQuiz(
      'Computer Science',
      5,
    )

    expect(new Set(quiz.map((q) => q.question)).size).toBe(5)
  })
})

describe('QuizGenerator.generateOptions', () => {
  it('shuffles the correct answer in among the distractors', () => {
    expect(new QuizGenerator(byFirstWord, firstDraw).generateOptions('How do magnets work?')).toEqual(
      {
        A: 'An incorrect interpretation',
        B: 'A false assumption',
        C: 'A common misconception',
        D: 'A step-by-step method',
        correct: 'D',
      },
    )
  })

  it('falls back to a generic correct answer', () => {
    const options = new QuizGenerator(byFirstWord, () => 0.99).generateOptions(
      'Name the noble gases',
    )

    expect(options.A).toBe('The correct answer')
    expect(options.correct).toBe('A')
  })

  it('picks the correct answer from the first word', () => {
    const generator = new QuizGenerator(byFirstWord, () => 0.99)

    expect(generator.generateOptions('Describe the nitrogen cycle').A).toBe(
      'A comprehensive overview',
    )
    expect(generator.generateOptions('Explain tides').A).toBe('A detailed process')
    expect(generator.generateOptions('What is mass?').A).toBe('A fundamental concept')
  })
})
