import { describe, expect, it } from 'vitest'
import { EmptyTextError } from '@/lib/errors'
import { selectSentenceIndices, TextSummarizer } from './extractive-summarizer'

const numbered = (count: number) =>
  Array.from({ length: count }, (_, i) => `Sentence ${i + 1}.`).join(' ')

describe('selectSentenceIndices', () => {
  it('keeps everything when the text is already short enough', () => {
    expect(selectSentenceIndices(3, 3)).toEqual([0, 1, 2])
  })

  it('keeps the opening sentence for a one-sentence summary', () => {
    expect(selectSentenceIndices(3, 1)).toEqual([0])
  })

  it('keeps the first and last sentences for a two-sentence summary', () => {
    expect(selectSentenceIndices(7, 2)).toEqual([0, 6])
  })

  it('spreads the remaining picks at an even stride', () => {
    expect(selectSentenceIndices(20, 6)).toEqual([0, 1, 6, 11, 16, 19])
  })

  it('cuts the candidates back to the requested count', () => {
    expect(selectSentenceIndices(10, 3)).toEqual([0, 1, 9])
    expect(selectSentenceIndices(11, 4)).toEqual([0, 1, 6, 10])
  })
})

describe('TextSummarizer', () => {
  const summarizer = new TextSummarizer(0.3)

  it('keeps about a third of the sentences', () => {
    expect(summarizer.summarize(numbered(20))).toBe(
      'Sentence 1. Sentence 2. Sentence 7. Sentence 12. Sentence 17. Sentence 20.',
    )
  })

  it('returns a single sentence unchanged', () => {
    expect(summarizer.summarize('Plants convert light into chemical energy.')).toBe(
      'Plants convert light into chemical energy.',
    )
  })

  it('normalizes spacing between the kept sentences', () => {
    expect(summarizer.summarize('First point.   Second point.\nThird point', 1)).toBe(
      'First point. Second point. Third point.',
    )
  })

  it('accepts a per-call compression ratio', () => {
    expect(summarizer.summarize(numbered(4), 0.5)).toBe('Sentence 1. Sentence 4.')
  })

  it('rejects text without sentences', () => {
    expect(() => summarizer.summarize('')).toThrow(EmptyTextError)
    expect(() => summarizer.summarize(' ... ')).toThrow('No text provided')
  })
})
