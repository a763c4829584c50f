/**
 * Traffic Ledger Contract
 *
 * Implementations must make `checkAndReserve` atomic per user:
 * two concurrent reservations can never both pass on the same headroom.
 */

export type LimitKind = 'per_file' | 'daily' | 'monthly';

export type ReservationResult =
  | { allowed: true }
  | { allowed: false; limitKind: LimitKind; limitBytes: number; usedBytes: number };

/**
 * `delivered` commits a reservation; `failed` and `cancelled` release it
 */
export type TransferOutcome = 'delivered' | 'failed' | 'cancelled';

export interface TrafficLedger {
  checkAndReserve(userId: string, byteSize: number): Promise<ReservationResult>;
  record(userId: string, byteSize: number, outcome: TransferOutcome): Promise<void>;
}
