/**
 * @tallybridge/settlement: Idempotency Store.
 *
 * Records which receipt ids have been consumed. `tryConsume` answers and
 * records in one synchronous step, so under the single-writer engine no
 * receipt can pass twice.
 *
 * Durability comes from the event log. Every processed delivery's event
 * carries its receipt id and the engine rebuilds this store by replay.
 * The engine consumes only once that event is written, so the store never
 * holds a receipt the log does not.
 */

import type { ConsumeContext, IdempotencyRecord } from "./types.js";

export interface IdempotencyStore {
  /**
   * Record the receipt the first time it is seen.
   *
   * @returns true if newly consumed, false if it was already consumed
   */
  tryConsume(receiptId: string, context: ConsumeContext): boolean;

  has(receiptId: string): boolean;

  get(receiptId: string): IdempotencyRecord | undefined;

  /** Number of records bound to a proposal. */
  boundTo(proposalId: number): number;

  /**
   * Drop every record bound to a proposal.
   *
   * @returns number of records removed
   */
  pruneProposal(proposalId: number): number;

  readonly size: number;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _records = new Map<string, IdempotencyRecord>();
  private readonly _byProposal = new Map<number, Set<string>>();

  tryConsume(receiptId: string, context: ConsumeContext): boolean {
    if (this._records.has(receiptId)) {
      return false;
    }

    const record: IdempotencyRecord =
      context.proposalId === undefined
        ? { receiptId, consumedAt: context.consumedAt }
        : { receiptId, consumedAt: context.consumedAt, proposalId: context.proposalId };
    this._records.set(receiptId, record);

    if (context.proposalId !== undefined) {
      let bound = this._byProposal.get(context.proposalId);
      if (bound === undefined) {
        bound = new Set();
        this._byProposal.set(context.proposalId, bound);
      }
      bound.add(receiptId);
    }

    return true;
  }

  has(receiptId: string): boolean {
    return this._records.has(receiptId);
  }

  get(receiptId: string): IdempotencyRecord | undefined {
    return this._records.get(receiptId);
  }

  boundTo(proposalId: number): number {
    return this._byProposal.get(proposalId)?.size ?? 0;
  }

  pruneProposal(proposalId: number): number {
    const bound = this._byProposal.get(proposalId);
    if (bound === undefined) {
      return 0;
    }
    for (const receiptId of bound) {
      this._records.delete(receiptId);
    }
    this._byProposal.delete(proposalId);
    return bound.size;
  }

  get size(): number {
    return this._records.size;
  }
}
