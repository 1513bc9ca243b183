// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import feedbackData from '@/data/feedback-templates.json'
import { DEFAULT_FEEDBACK_SUBJECT } from '@/lib/config/constants'
import type { FeedbackCategory, ScoreEntry } from '@/lib/types/feedback'
import { pickOne, type Random } from '@/lib/utils/random'

const templateList = z.array(z.string().min(1)).min(1)

const feedbackTemplatesSchema = z.object({
  excellent: templateList,
  good: templateList,
  fair: templateList,
  needs_improvement: templateList,
})

export type FeedbackTemplates = z.infer<typeof feedbackTemplatesSchema>

export function categorizeScore(score: number): FeedbackCategory {
  if (score >= 80) return 'excellent'
  if (score >= 60) return 'good'
  if (score >= 40) return 'fair'
  return 'needs_improvement'
}

export class FeedbackGenerator {
  private readonly templates: FeedbackTemplates

  constructor(
    private readonly random: Random,
    templates?: FeedbackTemplates,
  ) {
    this.templates = templates ?? feedbackTemplatesSchema.parse(feedbackData)
  }

  /** One encouraging line for the score's band, tagged with the subject. */
  generateFeedback(score: number, subject: string = DEFAULT_FEEDBACK_SUBJECT): string {
    const message = pickOne(this.templates[categorizeScore(score)], this.random)
    return `${message} (${subject})`
  }

  generateBatchFeedback(entries: readonly ScoreEntry[]): string[] {
    return entries.map(({ score, subject }) => this.generateFeedback(score, subject))
  }
}
