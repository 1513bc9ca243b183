// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Formats a date object into a string in the format YYYY-MM-DD
 * @param date Date object to format
 * @returns String in YYYY-MM-DD format
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear()
  const month = pad(date.getMonth() + 1) // Months are 0-indexed
  const day = pad(date.getDate())

  return `${year}-${month}-${day}`
}

/**
 * Formats a date object into a compact YYYYMMDD_HHMMSS stamp for file names
 */
export function formatFileTimestamp(date: Date): string {
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${formatDate(date).replaceAll('-', '')}_${time}`
}

/**
 * Returns midnight of the calendar day `days` after the given date, in local time.
 * Going through the calendar fields keeps the result on the right day across DST changes.
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days)
}

const TIE_CHECK_DIGITS = 30

/**
 * Rounds the exact binary value of `value` to `decimals` places. 2.675 is stored
 * just below the half and gives 2.67; exact halves go to the even neighbour, so
 * 1.25 -> 1.2 and 0.75 -> 0.8.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value

  // toFixed works on the exact value and breaks ties away from zero
  const nearest = Number(value.toFixed(decimals))
  const expansion = value.toFixed(decimals + TIE_CHECK_DIGITS)
  if (expansion.slice(-TIE_CHECK_DIGITS) !== `5${'0'.repeat(TIE_CHECK_DIGITS - 1)}`) {
    return nearest
  }

  const truncated = expansion.slice(0, -TIE_CHECK_DIGITS)
  const lastDigit = Number(truncated.replace('.', '').slice(-1))
  return lastDigit % 2 === 0 ? Number(truncated) : nearest
}
