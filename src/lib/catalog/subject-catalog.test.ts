import { describe, expect, it } from 'vitest'
import { SubjectCatalog } from './subject-catalog'

describe('SubjectCatalog', () => {
  const catalog = new SubjectCatalog({ Mathematics: 'algebra', History: 'timelines' })

  it('returns the entry for a known subject', () => {
    expect(catalog.get('History')).toBe('timelines')
  })

  it('falls back to Mathematics for an unknown subject', () => {
    expect(catalog.get('Astrology')).toBe('algebra')
    expect(catalog.has('Astrology')).toBe(false)
  })

  it('lists subjects in insertion order', () => {
    expect(catalog.subjects()).toEqual(['Mathematics', 'History'])
  })

  it('requires the fallback subject to be present', () => {
    expect(() => new SubjectCatalog({ History: 'timelines' })).toThrow(
      'Catalog has no entry for fallback subject "Mathematics"',
    )
  })

  it('validates JSON catalogs', () => {
    expect(() => SubjectCatalog.fromJson({ Mathematics: [] }, 'test')).toThrow(
      /^Invalid test catalog/,
    )
    expect(SubjectCatalog.fromJson({ Mathematics: ['a', 'b'] }, 'test').get('Science')).toEqual([
      'a',
      'b',
    ])
  })
})
