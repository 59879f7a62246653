// ---------------------------------------------------------------------------
// Shared request-body fields
// ---------------------------------------------------------------------------

import { z } from 'zod'
import { LEDGER_CATEGORIES, amount, isIsoDate, toMonthKey } from '@studioledger/domain'
import type { LedgerCategory } from '@studioledger/domain'

/** A decimal amount sent as a JSON number or a numeric string. */
export const AmountField = z
  .union([z.number().finite(), z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal amount')])
  .transform((value) => amount(value))

export const DateField = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD calendar date' })

export const MonthField = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Expected a YYYY-MM month')
  .transform((value) => toMonthKey(value))

export const CategoryField = z.string().transform((value, ctx): LedgerCategory => {
  const category = LEDGER_CATEGORIES.find((c) => c === value)
  if (category === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown category: ${value}` })
    return z.NEVER
  }
  return category
})

export const IdField = z.string().trim().min(1)

export const TextField = z.string().trim()

/** Reads `limit` / `offset` query params, capping the page at 100. */
export function pageParams(query: (name: string) => string | undefined): { limit: number; offset: number } {
  const limit = Number(query('limit') ?? '50')
  const offset = Number(query('offset') ?? '0')
  return {
    limit: Number.isInteger(limit) && limit > 0 ? Math.min(limit, 100) : 50,
    offset: Number.isInteger(offset) && offset >= 0 ? offset : 0,
  }
}
