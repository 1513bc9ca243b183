import { describe, expect, it } from 'vitest'
import { createTestServices, jsonRequest } from '@/lib/testing/services'
import { createPlanDownloadHandler } from './handler'

const handler = createPlanDownloadHandler(createTestServices())

describe('POST /api/study-plan/download-csv', () => {
  it('returns the plan as a CSV attachment', async () => {
    const res = await handler(
      jsonRequest('/api/study-plan/download-csv', { subject: 'Mathematics', hours: 10, days: 5 }),
    )
    const lines = (await res.text()).split('\n')

    expect(res.status).toBe(200)
    expect(res.headers.get('Content-Type')).toBe('text/csv; charset=utf-8')
    expect(res.headers.get('Content-Disposition')).toBe(
      'attachment; filename="study_plan_Mathematics_20261018_140530.csv"',
    )
    expect(lines).toHaveLength(12)
    expect(lines[0]).toBe('Date,Day,Time,Activity,Duration,Subject,Scenario')
    expect(lines[1]).toBe(
      '2026-10-18,Day 1,9:00 - 10:00,Review fundamental concepts,1 hour,Mathematics,exam_prep',
    )
    expect(lines[10]).toBe(
      '2026-10-22,Day 5,10:00 - 11:00,Review mistakes and reinforce,1 hour,Mathematics,exam_prep',
    )
    expect(lines[11]).toBe('')
  })

  it('writes only the header when no day reaches a whole hour', async () => {
    const res = await handler(jsonRequest('/api/study-plan/download-csv', { hours: 2, days: 4 }))

    expect(await res.text()).toBe('Date,Day,Time,Activity,Duration,Subject,Scenario\n')
  })

  it('makes the subject safe for a file name', async () => {
    const res = await handler(
      jsonRequest('/api/study-plan/download-csv', { subject: 'Computer Science', hours: 1, days: 1 }),
    )

    expect(res.headers.get('Content-Disposition')).toBe(
      'attachment; filename="study_plan_Computer_Science_20261018_140530.csv"',
    )
  })

  it('answers errors with the JSON envelope', async () => {
    const res = await handler(jsonRequest('/api/study-plan/download-csv', { days: 1.5 }))
    const body = await res.json()

    expect(res.status).toBe(400)
    expect(body.error.code).toBe('INVALID_DAY_COUNT')
  })
})
