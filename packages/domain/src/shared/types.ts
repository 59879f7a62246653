// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

import { Decimal } from 'decimal.js'
import { addMonths, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns'

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. BillId for InvoiceId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Cross-cutting ID types
// ---------------------------------------------------------------------------

/** Identifies a staff member (the authenticated actor, a payee, a recorder). */
export type UserId = Brand<string, 'UserId'>

export type ClientId = Brand<string, 'ClientId'>
export type LeadId = Brand<string, 'LeadId'>
export type ProjectId = Brand<string, 'ProjectId'>

/** A cash or bank account that money moves in and out of. */
export type AccountId = Brand<string, 'AccountId'>

export type VendorId = Brand<string, 'VendorId'>

export const toUserId = (raw: string): UserId => raw as UserId
export const toClientId = (raw: string): ClientId => raw as ClientId
export const toLeadId = (raw: string): LeadId => raw as LeadId
export const toProjectId = (raw: string): ProjectId => raw as ProjectId
export const toAccountId = (raw: string): AccountId => raw as AccountId
export const toVendorId = (raw: string): VendorId => raw as VendorId

// ---------------------------------------------------------------------------
// Calendar dates
// ---------------------------------------------------------------------------

/**
 * A calendar date without a time component, formatted `YYYY-MM-DD`.
 *
 * ISO day keys sort lexicographically in calendar order, so `<` and `>` on two
 * IsoDate values compare the dates themselves.
 */
export type IsoDate = Brand<string, 'IsoDate'>

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/** Returns true when `raw` is a real calendar date in `YYYY-MM-DD` form. */
export function isIsoDate(raw: string): raw is IsoDate {
  return ISO_DATE_PATTERN.test(raw) && isValid(parseISO(raw))
}

/**
 * @throws {Error} if `raw` is not a valid `YYYY-MM-DD` calendar date.
 */
export function toIsoDate(raw: string): IsoDate {
  if (!isIsoDate(raw)) {
    throw new Error(`Invalid calendar date: ${raw}`)
  }
  return raw
}

/** Formats the local calendar day of a JS Date. */
export function isoDateFromDate(date: Date): IsoDate {
  return toIsoDate(format(date, 'yyyy-MM-dd'))
}

/** The current calendar day in the given IANA time zone. */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  // en-CA renders dates as YYYY-MM-DD
  const formatted = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now)
  return toIsoDate(formatted)
}

export function compareDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from))
}

/**
 * Adds whole months to a date, clamping the day to 28 so the result always
 * exists in the target month.
 */
export function addMonthsClamped(date: IsoDate, months: number): IsoDate {
  const base = parseISO(date)
  const shifted = addMonths(new Date(base.getFullYear(), base.getMonth(), 1), months)
  const day = Math.min(base.getDate(), 28)
  return isoDateFromDate(new Date(shifted.getFullYear(), shifted.getMonth(), day))
}

/** Replaces the day-of-month of a date. The caller guarantees the day exists. */
export function withDayOfMonth(date: IsoDate, day: number): IsoDate {
  const base = parseISO(date)
  return isoDateFromDate(new Date(base.getFullYear(), base.getMonth(), day))
}

// ---------------------------------------------------------------------------
// Amount value object
// ---------------------------------------------------------------------------

/**
 * A fixed-point monetary amount. All derived amounts are rounded to two
 * decimal places (half-up); no amount is ever represented as a float.
 */
export type Amount = Decimal

export type AmountInput = Decimal | string | number

export const ZERO: Amount = new Decimal(0)

export function amount(value: AmountInput): Amount {
  return new Decimal(value)
}

/** Rounds to 2 decimal places, half away from zero. */
export function round2(value: AmountInput): Amount {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
}

export function sumAmounts(values: readonly Amount[]): Amount {
  return round2(values.reduce<Amount>((total, value) => total.plus(value), ZERO))
}

/** `max(value, 0)` */
export function nonNegative(value: Amount): Amount {
  return value.isNegative() ? ZERO : value
}

export function clampAmount(value: Amount, min: Amount, max: Amount): Amount {
  return Decimal.min(Decimal.max(value, min), max)
}

/** Applies a percentage, e.g. `percentOf(1000, 18)` → 180.00. */
export function percentOf(base: Amount, percent: Amount): Amount {
  return round2(base.times(percent).dividedBy(100))
}

/** Fixed 2-dp string, the wire and storage representation. */
export function formatAmount(value: Amount): string {
  return value.toFixed(2, Decimal.ROUND_HALF_UP)
}

export function isPositive(value: Amount): boolean {
  return value.greaterThan(0)
}

export function isZeroOrLess(value: Amount): boolean {
  return value.lessThanOrEqualTo(0)
}

// ---------------------------------------------------------------------------
// Period value object
// ---------------------------------------------------------------------------

/**
 * A calendar month, `YYYY-MM`.
 */
export type MonthKey = Brand<string, 'MonthKey'>

const MONTH_KEY_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/

/**
 * @throws {Error} if `raw` is not in `YYYY-MM` form.
 */
export function toMonthKey(raw: string): MonthKey {
  if (!MONTH_KEY_PATTERN.test(raw)) {
    throw new Error(`Invalid month: ${raw}. Use YYYY-MM.`)
  }
  return raw as MonthKey
}

export function monthOf(date: IsoDate): MonthKey {
  return toMonthKey(date.slice(0, 7))
}

/** The half-open date range [first day of month, first day of next month). */
export function monthRange(month: MonthKey): { readonly start: IsoDate; readonly end: IsoDate } {
  const start = toIsoDate(`${month}-01`)
  return { start, end: addMonthsClamped(start, 1) }
}
