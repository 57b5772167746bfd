/**
 * In-process idempotency cache for ticket issuance.
 *
 * How it works:
 * 1. checkAndReserve() fingerprints the request body and either reserves the
 *    key (no_key), or reports a replay, an in-flight duplicate or a conflict
 * 2. The caller does the work and attaches the response with attachResponse()
 * 3. If the work fails the caller releases the reservation, so a retry with
 *    the same key starts fresh
 *
 * Every operation first evicts entries older than the TTL.
 */

import { fingerprintRequest } from '../utils/fingerprint';
import { createContextLogger } from '../utils/logger';

const log = createContextLogger({ component: 'IdempotencyCache' });

const DEFAULT_TTL_MINUTES = 60;

export interface IdempotencyEntry<T> {
  fingerprint: string;
  response: T | null;
  createdAt: number;
}

export type IdempotencyOutcome<T> =
  | { type: 'no_key' }
  | { type: 'replay'; response: T }
  | { type: 'in_progress' }
  | { type: 'conflict' };

export interface IdempotencyCacheOptions {
  ttlMinutes?: number;
  now?: () => number;
}

export class IdempotencyCache<T> {
  private entries = new Map<string, IdempotencyEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: IdempotencyCacheOptions = {}) {
    const ttlMinutes = options.ttlMinutes ?? DEFAULT_TTL_MINUTES;
    if (!Number.isFinite(ttlMinutes) || ttlMinutes <= 0) {
      throw new Error(`Idempotency TTL must be a positive number of minutes, got ${ttlMinutes}`);
    }
    this.ttlMs = ttlMinutes * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Look up the key and reserve it when absent. A replay hands out a copy,
   * never the stored response.
   * Runs without yielding to the event loop, so concurrent callers with the
   * same new key cannot both receive no_key.
   */
  checkAndReserve(key: string, requestBody: unknown): IdempotencyOutcome<T> {
    this.evictExpired();

    const fingerprint = fingerprintRequest(requestBody);
    const existing = this.entries.get(key);

    if (!existing) {
      this.entries.set(key, { fingerprint, response: null, createdAt: this.now() });
      return { type: 'no_key' };
    }

    if (existing.fingerprint !== fingerprint) {
      log.warn({ idempotencyKey: key }, 'Idempotency key reused with different request');
      return { type: 'conflict' };
    }

    if (existing.response === null) {
      log.warn({ idempotencyKey: key }, 'Duplicate request while first is in flight');
      return { type: 'in_progress' };
    }

    return { type: 'replay', response: structuredClone(existing.response) };
  }

  /**
   * Store a copy of the response for a reserved key. Last write wins; the
   * fingerprint never changes. Unknown or evicted keys are ignored.
   */
  attachResponse(key: string, response: T): void {
    this.evictExpired();

    const existing = this.entries.get(key);
    if (!existing) {
      log.warn({ idempotencyKey: key }, 'Cannot attach response, key not reserved');
      return;
    }

    this.entries.set(key, { ...existing, response: structuredClone(response) });
  }

  /**
   * Drop a reservation whose work failed. Completed entries are kept.
   */
  release(key: string): boolean {
    this.evictExpired();

    const existing = this.entries.get(key);
    if (!existing || existing.response !== null) {
      return false;
    }

    return this.entries.delete(key);
  }

  evictExpired(): number {
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;

    for (const [key, entry] of this.entries) {
      if (entry.createdAt < cutoff) {
        this.entries.delete(key);
        evicted++;
      }
    }

    if (evicted > 0) {
      log.debug({ evicted }, 'Evicted expired idempotency entries');
    }
    return evicted;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
