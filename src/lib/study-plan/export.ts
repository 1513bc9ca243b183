// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { StudyPlanExportRow } from '@/lib/types/study-plan'
import { formatFileTimestamp } from '@/lib/utils'

const CSV_COLUMNS: ReadonlyArray<[header: string, field: keyof StudyPlanExportRow]> = [
  ['Date', 'date'],
  ['Day', 'day'],
  ['Time', 'time'],
  ['Activity', 'activity'],
  ['Duration', 'duration'],
  ['Subject', 'subject'],
  ['Scenario', 'scenario'],
]

// Quote a field only when it contains a delimiter, quote or line break
const escapeCsvField = (value: string) =>
  /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value

/**
 * Serializes export rows as CSV with a header row. Lines end with `\n`,
 * including the last one.
 */
export function toCsv(rows: readonly StudyPlanExportRow[]): string {
  const header = CSV_COLUMNS.map(([title]) => title).join(',')
  const lines = rows.map((row) =>
    CSV_COLUMNS.map(([, field]) => escapeCsvField(row[field])).join(','),
  )
  return [header, ...lines].map((line) => `${line}\n`).join('')
}

export function exportFilename(subject: string, now: Date): string {
  const safeSubject = subject.replace(/[^A-Za-z0-9_-]+/g, '_')
  return `study_plan_${safeSubject}_${formatFileTimestamp(now)}.csv`
}
