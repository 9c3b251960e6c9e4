/**
 * Shared Types
 *
 * Re-exports branded types from time-date and defines the domain ID type
 * used across modules.
 */

export type { LocalDate, LocalTime, LocalDateTime, Weekday, TimeWindow } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __eventId: unique symbol

export type EventId = string & { readonly [__eventId]: true }
