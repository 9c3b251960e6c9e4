/**
 * Consolidated error system for calendir.
 *
 * All error classes extend CalendirError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are working with.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendirErrorCode = {
  // Expression parser
  PARSE_ERROR: 'PARSE_ERROR',

  // Record model
  VALIDATION: 'VALIDATION',

  // Store
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',
  STORE_IO: 'STORE_IO',

  // Synchronization tool
  SYNC_FAILED: 'SYNC_FAILED',
} as const

export type CalendirErrorCode = (typeof CalendirErrorCode)[keyof typeof CalendirErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendirError extends Error {
  readonly code: CalendirErrorCode

  constructor(code: CalendirErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendirError'
    this.code = code
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export const ParseErrorReason = {
  UNRECOGNIZED_FORMAT: 'UNRECOGNIZED_FORMAT',
  INVALID_DATE: 'INVALID_DATE',
  INVALID_TIME: 'INVALID_TIME',
  MISSING_TIME: 'MISSING_TIME',
} as const

export type ParseErrorReason = (typeof ParseErrorReason)[keyof typeof ParseErrorReason]

const reasonText: Record<ParseErrorReason, string> = {
  UNRECOGNIZED_FORMAT: 'Unrecognized format',
  INVALID_DATE: 'Invalid date',
  INVALID_TIME: 'Invalid time',
  MISSING_TIME: 'Missing time',
}

export class ParseError extends CalendirError {
  readonly reason: ParseErrorReason
  readonly input: string

  constructor(reason: ParseErrorReason, input: string, detail?: string) {
    super(
      CalendirErrorCode.PARSE_ERROR,
      `${reasonText[reason]}: '${input}'${detail ? ` (${detail})` : ''}`
    )
    this.name = 'ParseError'
    this.reason = reason
    this.input = input
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends CalendirError {
  constructor(message: string) {
    super(CalendirErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class NotFoundError extends CalendirError {
  constructor(message: string) {
    super(CalendirErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends CalendirError {
  constructor(message: string) {
    super(CalendirErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

export class StoreIoError extends CalendirError {
  readonly path: string

  constructor(message: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(CalendirErrorCode.STORE_IO, `${message} '${path}'${detail}`, { cause })
    this.name = 'StoreIoError'
    this.path = path
  }
}

// ============================================================================
// Sync Errors
// ============================================================================

export class SyncError extends CalendirError {
  /** Exit status of the synchronization tool, null when it never ran. */
  readonly status: number | null

  constructor(message: string, status: number | null, cause?: unknown) {
    super(CalendirErrorCode.SYNC_FAILED, message, { cause })
    this.name = 'SyncError'
    this.status = status
  }
}
