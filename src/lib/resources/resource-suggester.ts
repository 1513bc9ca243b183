// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import resourceData from '@/data/resources.json'
import { SubjectCatalog } from '@/lib/catalog/subject-catalog'

export class ResourceSuggester {
  private readonly catalog: SubjectCatalog<readonly string[]>

  constructor(catalog?: SubjectCatalog<readonly string[]>) {
    this.catalog = catalog ?? SubjectCatalog.fromJson(resourceData, 'resource')
  }

  /** Curated links for the subject; unknown subjects get the Mathematics list. */
  suggestResources(subject: string): string[] {
    return [...this.catalog.get(subject)]
  }
}
