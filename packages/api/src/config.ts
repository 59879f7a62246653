// ---------------------------------------------------------------------------
// Runtime configuration
//
// Environment variables are read once and validated with zod. Anything that
// needs configuration receives the parsed AppConfig instead of reading
// process.env itself.
//
//   DATABASE_URL       PostgreSQL connection string (required outside tests)
//   NODE_ENV           development | test | production
//   DB_POOL_MAX        maximum pooled connections (default: 10)
//   BUSINESS_TIMEZONE  IANA zone that defines "today" (default: Asia/Kolkata)
//   RECEIPT_PREFIX     leading segment of receipt numbers (default: RCT)
// ---------------------------------------------------------------------------

import { z } from 'zod'

const ConfigSchema = z
  .object({
    DATABASE_URL: z.string().url().optional(),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    BUSINESS_TIMEZONE: z
      .string()
      .min(1)
      .refine(isTimeZone, { message: 'Unknown IANA time zone' })
      .default('Asia/Kolkata'),
    RECEIPT_PREFIX: z
      .string()
      .regex(/^[A-Z0-9]+$/, 'Use upper-case letters and digits only')
      .default('RCT'),
  })
  .refine((env) => env.NODE_ENV === 'test' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required',
    path: ['DATABASE_URL'],
  })

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone })
    return true
  } catch {
    return false
  }
}

export type AppConfig = Readonly<{
  databaseUrl?: string
  nodeEnv: 'development' | 'test' | 'production'
  dbPoolMax: number
  businessTimeZone: string
  receiptPrefix: string
}>

/**
 * Parses configuration from an environment map.
 *
 * @throws {Error} listing every invalid key when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`)
  }
  const parsed = result.data
  return Object.freeze({
    ...(parsed.DATABASE_URL !== undefined ? { databaseUrl: parsed.DATABASE_URL } : {}),
    nodeEnv: parsed.NODE_ENV,
    dbPoolMax: parsed.DB_POOL_MAX,
    businessTimeZone: parsed.BUSINESS_TIMEZONE,
    receiptPrefix: parsed.RECEIPT_PREFIX,
  })
}
