/**
 * @tallybridge/settlement: Ledger time.
 *
 * Window checks and staleness use the settlement ledger's notion of time,
 * expressed as integer unix seconds. The engine never reads a wall clock
 * directly.
 */

import { SettlementError } from "./types.js";

export interface LedgerClock {
  /** Current ledger time in unix seconds */
  now(): number;
}

/**
 * Wall-clock ledger time that never moves backwards, even if the host
 * clock is adjusted.
 */
export class SystemLedgerClock implements LedgerClock {
  private _last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    if (current > this._last) {
      this._last = current;
    }
    return this._last;
  }
}

/**
 * Manually driven clock for tests and replays.
 */
export class ManualLedgerClock implements LedgerClock {
  private _now: number;

  constructor(start: number) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(time: number): void {
    if (time < this._now) {
      throw new SettlementError("CLOCK_REWIND", `Cannot move ledger time back from ${this._now} to ${time}`);
    }
    this._now = time;
  }

  advance(seconds: number): void {
    this.set(this._now + seconds);
  }
}

export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
