import { describe, expect, it } from 'vitest'
import { SUBJECTS } from '@/lib/catalog/subject-catalog'
import { activitiesFor, activityForDay } from './activities'

describe('activitiesFor', () => {
  it('has five activities for every subject', () => {
    for (const subject of SUBJECTS) {
      expect(activitiesFor(subject)).toHaveLength(5)
    }
  })

  it('falls back to the Mathematics progression', () => {
    expect(activitiesFor('Underwater Basket Weaving')).toEqual(activitiesFor('Mathematics'))
  })
})

describe('activityForDay', () => {
  it('follows the subject progression from day 1', () => {
    expect(activityForDay('History', 1)).toBe('Read historical context')
    expect(activityForDay('History', 5)).toBe('Review key dates and figures')
  })

  it('cycles back to the start after the last activity', () => {
    expect(activityForDay('Science', 6)).toBe(activityForDay('Science', 1))
    expect(activityForDay('Science', 7)).toBe('Create visual diagrams')
  })
})
