import type { IsoDate, UserId } from '@studioledger/domain'

/**
 * Request-scoped inputs every service receives from its caller. `today` is the
 * business date in the configured time zone; services never read the clock.
 */
export interface ServiceContext {
  readonly today: IsoDate
  readonly actorId?: UserId
  readonly receiptPrefix: string
}
