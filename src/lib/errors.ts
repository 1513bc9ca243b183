// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export type StudyErrorCode = 'INVALID_DAY_COUNT' | 'INVALID_HOURS' | 'EMPTY_TEXT' | 'INVALID_REQUEST'

/**
 * Base class for errors the API reports back to the caller as a client error.
 * The `code` and `message` fields are what `errorResponse` puts on the wire.
 */
export class StudyError extends Error {
  readonly code: StudyErrorCode
  readonly status: number

  constructor(code: StudyErrorCode, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'StudyError'
    this.code = code
    this.status = options?.status ?? 400
  }
}

export class InvalidDayCountError extends StudyError {
  constructor(days: number) {
    super('INVALID_DAY_COUNT', `Invalid day count: ${days}. A plan needs at least one whole day.`)
    this.name = 'InvalidDayCountError'
  }
}

export class InvalidHoursError extends StudyError {
  constructor(hours: number) {
    super('INVALID_HOURS', `Invalid study hours: ${hours}. Hours must be a positive, finite number.`)
    this.name = 'InvalidHoursError'
  }
}

export class EmptyTextError extends StudyError {
  constructor() {
    super('EMPTY_TEXT', 'No text provided')
    this.name = 'EmptyTextError'
  }
}

export class InvalidRequestError extends StudyError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_REQUEST', message, { cause })
    this.name = 'InvalidRequestError'
  }
}
