import { describe, expect, it } from 'vitest'
import { GET } from './route'

describe('GET /api/subjects', () => {
  it('lists the supported subjects', async () => {
    const res = await GET()
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.data.subjects).toEqual([
      'Mathematics',
      'Science',
      'History',
      'Literature',
      'Computer Science',
    ])
  })
})
