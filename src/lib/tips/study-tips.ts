// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import tipData from '@/data/study-tips.json'
import { SubjectCatalog } from '@/lib/catalog/subject-catalog'
import { DEFAULT_TIP_COUNT } from '@/lib/config/constants'

export class StudyTipsGenerator {
  private readonly catalog: SubjectCatalog<readonly string[]>

  constructor(catalog?: SubjectCatalog<readonly string[]>) {
    this.catalog = catalog ?? SubjectCatalog.fromJson(tipData, 'study tip')
  }

  // Tips are returned in catalog order, so the same request always gets the same tips
  generateTips(subject: string, numTips: number = DEFAULT_TIP_COUNT): string[] {
    return this.catalog.get(subject).slice(0, Math.max(0, numTips))
  }
}
