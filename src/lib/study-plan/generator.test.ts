import { describe, expect, it } from 'vitest'
import { InvalidDayCountError, InvalidHoursError } from '@/lib/errors'
import { flattenForExport, generateStudyPlan } from './generator'

const now = new Date(2026, 9, 18, 9, 41)

describe('generateStudyPlan', () => {
  it('builds a five-day exam plan of two hours a day', () => {
    const plan = generateStudyPlan(
      { subject: 'Mathematics', hours: 10, scenario: 'exam_prep', days: 5 },
      now,
    )

    expect(plan).toMatchObject({
      subject: 'Mathematics',
      totalHours: 10,
      totalDays: 5,
      scenario: 'exam_prep',
      intensity: 'high',
      focus: 'comprehensive review and practice',
      startDate: '2026-10-18',
    })
    expect(plan.schedule).toHaveLength(5)
    for (const day of plan.schedule) {
      expect(day.hours).toBe(2)
      expect(day.timeSlots.map((slot) => slot.label)).toEqual(['9:00 - 10:00', '10:00 - 11:00'])
    }
    expect(plan.schedule[0]).toEqual({
      day: 1,
      date: '2026-10-18',
      hours: 2,
      activity: 'Review fundamental concepts',
      timeSlots: [
        { label: '9:00 - 10:00', duration: '1 hour', activity: 'Study session 1' },
        { label: '10:00 - 11:00', duration: '1 hour', activity: 'Study session 2' },
      ],
    })
  })

  it('defaults to five days', () => {
    const plan = generateStudyPlan({ subject: 'Science', hours: 5, scenario: 'homework' }, now)

    expect(plan.totalDays).toBe(5)
    expect(plan.schedule).toHaveLength(5)
    expect(plan.intensity).toBe('medium')
  })

  it('keeps the requested scenario name but uses exam_prep details for unknown ones', () => {
    const plan = generateStudyPlan(
      { subject: 'History', hours: 3, scenario: 'midterm_cram', days: 3 },
      now,
    )

    expect(plan.scenario).toBe('midterm_cram')
    expect(plan.intensity).toBe('high')
    expect(plan.focus).toBe('comprehensive review and practice')
  })

  it('produces the same plan for the same inputs and clock', () => {
    const input = { subject: 'Literature', hours: 12, scenario: 'project', days: 4 }
    expect(generateStudyPlan(input, now)).toEqual(generateStudyPlan(input, new Date(now)))
  })

  it('surfaces invalid day counts and hours', () => {
    expect(() =>
      generateStudyPlan({ subject: 'History', hours: 5, scenario: 'exam_prep', days: 0 }, now),
    ).toThrow(InvalidDayCountError)
    expect(() =>
      generateStudyPlan({ subject: 'History', hours: -3, scenario: 'exam_prep', days: 5 }, now),
    ).toThrow(InvalidHoursError)
  })
})

describe('flattenForExport', () => {
  it('emits one row per day and slot', () => {
    const plan = generateStudyPlan(
      { subject: 'Mathematics', hours: 10, scenario: 'exam_prep', days: 5 },
      now,
    )
    const rows = flattenForExport(plan)

    expect(rows).toHaveLength(10)
    expect(rows[0]).toEqual({
      date: '2026-10-18',
      day: 'Day 1',
      time: '9:00 - 10:00',
      activity: 'Review fundamental concepts',
      duration: '1 hour',
      subject: 'Mathematics',
      scenario: 'exam_prep',
    })
    expect(rows[9]).toMatchObject({ date: '2026-10-22', day: 'Day 5', time: '10:00 - 11:00' })
  })

  it('skips days that have no whole hour', () => {
    const plan = generateStudyPlan(
      { subject: 'Mathematics', hours: 3, scenario: 'homework', days: 4 },
      now,
    )

    expect(plan.schedule).toHaveLength(4)
    expect(flattenForExport(plan)).toEqual([])
  })
})
