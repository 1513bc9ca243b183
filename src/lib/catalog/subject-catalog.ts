// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { DEFAULT_SUBJECT } from '@/lib/config/constants'

export const SUBJECTS = ['Mathematics', 'Science', 'History', 'Literature', 'Computer Science'] as const

export type Subject = (typeof SUBJECTS)[number]

// Catalog files map each subject to a non-empty list of strings
export const subjectListSchema = z.record(z.string(), z.array(z.string().min(1)).min(1))

/**
 * Read-only lookup keyed by subject name. Unknown subjects resolve to the
 * fallback subject's entry instead of failing.
 */
export class SubjectCatalog<T> {
  private readonly entries: ReadonlyMap<string, T>
  private readonly fallback: T

  constructor(entries: Record<string, T>, fallbackSubject: string = DEFAULT_SUBJECT) {
    this.entries = new Map(Object.entries(entries))
    const fallback = this.entries.get(fallbackSubject)
    if (fallback === undefined) {
      throw new Error(`Catalog has no entry for fallback subject "${fallbackSubject}"`)
    }
    this.fallback = fallback
  }

  /** Builds a catalog of string lists from raw (JSON) data, validating its shape. */
  static fromJson(data: unknown, name: string): SubjectCatalog<readonly string[]> {
    const parsed = subjectListSchema.safeParse(data)
    if (!parsed.success) {
      throw new Error(`Invalid ${name} catalog: ${parsed.error.message}`)
    }
    return new SubjectCatalog<readonly string[]>(parsed.data)
  }

  get(subject: string): T {
    return this.entries.get(subject) ?? this.fallback
  }

  has(subject: string): boolean {
    return this.entries.has(subject)
  }

  subjects(): string[] {
    return [...this.entries.keys()]
  }
}
