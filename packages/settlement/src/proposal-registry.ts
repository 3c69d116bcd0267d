/**
 * @tallybridge/settlement: Proposal Registry.
 *
 * Holds every proposal and enforces its lifecycle:
 *
 *   draft → open → closed → archived
 *
 * Proposals are never deleted. Each transition replaces the stored value
 * with a new immutable Proposal. Timestamps are passed in by the caller so
 * the same methods serve live administration and event replay.
 *
 * The `plan*` methods check a transition and return the resulting
 * proposal without storing it; `commit` stores it. A writer that records
 * an event per transition plans, appends the event, then commits, so a
 * failed append leaves the registry untouched.
 */

import { isUint32 } from "@tallybridge/types";
import type { Proposal, ProposalDefinition, ProposalState } from "@tallybridge/types";
import { RegistryError } from "./types.js";

export const MAX_CHOICES = 255;

export class ProposalRegistry {
  private readonly _proposals = new Map<number, Proposal>();

  // ─── Lifecycle ────────────────────────────────────────────────────────

  create(def: ProposalDefinition, now: number): Proposal {
    return this.commit(this.planCreate(def, now));
  }

  open(id: number, now: number): Proposal {
    return this.commit(this.planOpen(id, now));
  }

  /**
   * Administrative close, regardless of the window.
   */
  close(id: number, now: number): Proposal {
    return this.commit(this.planClose(id, now));
  }

  /**
   * @returns the closed proposal, or undefined if nothing changed
   */
  closeIfExpired(id: number, now: number): Proposal | undefined {
    const closed = this.planCloseIfExpired(id, now);
    return closed === undefined ? undefined : this.commit(closed);
  }

  archive(id: number, now: number): Proposal {
    return this.commit(this.planArchive(id, now));
  }

  // ─── Planning ─────────────────────────────────────────────────────────

  /**
   * A draft proposal. It must be created before its window opens.
   */
  planCreate(def: ProposalDefinition, now: number): Proposal {
    validateDefinition(def);

    if (this._proposals.has(def.id)) {
      throw new RegistryError("PROPOSAL_EXISTS", `Proposal ${def.id} already exists`);
    }
    if (now >= def.opensAt) {
      throw new RegistryError(
        "INVALID_PROPOSAL",
        `Proposal ${def.id} must be created before its window opens (opensAt ${def.opensAt}, now ${now})`,
      );
    }

    return {
      id: def.id,
      choiceCount: def.choiceCount,
      opensAt: def.opensAt,
      closesAt: def.closesAt,
      treasuryRoute: def.treasuryRoute,
      mode: def.mode ?? "payment",
      state: "draft",
      title: def.title,
      createdAt: now,
    };
  }

  planOpen(id: number, now: number): Proposal {
    const proposal = this._transition(id, "draft", "open");
    if (now >= proposal.closesAt) {
      throw new RegistryError(
        "INVALID_TRANSITION",
        `Proposal ${id} cannot open after its window ended (closesAt ${proposal.closesAt}, now ${now})`,
      );
    }
    return { ...proposal, state: "open", openedAt: now };
  }

  planClose(id: number, now: number): Proposal {
    const proposal = this._transition(id, "open", "closed");
    return { ...proposal, state: "closed", closedAt: now };
  }

  /**
   * Close an open proposal whose window has ended. The recorded closedAt
   * is the proposal's closesAt, not the time the close was noticed.
   */
  planCloseIfExpired(id: number, now: number): Proposal | undefined {
    const proposal = this.require(id);
    if (proposal.state !== "open" || now < proposal.closesAt) {
      return undefined;
    }
    return { ...proposal, state: "closed", closedAt: proposal.closesAt };
  }

  planArchive(id: number, now: number): Proposal {
    const proposal = this._transition(id, "closed", "archived");
    return { ...proposal, state: "archived", archivedAt: now };
  }

  commit(proposal: Proposal): Proposal {
    this._proposals.set(proposal.id, proposal);
    return proposal;
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  get(id: number): Proposal | undefined {
    return this._proposals.get(id);
  }

  require(id: number): Proposal {
    const proposal = this._proposals.get(id);
    if (proposal === undefined) {
      throw new RegistryError("PROPOSAL_NOT_FOUND", `Proposal ${id} not found`);
    }
    return proposal;
  }

  list(state?: ProposalState): readonly Proposal[] {
    const all = [...this._proposals.values()].sort((a, b) => a.id - b.id);
    return state === undefined ? all : all.filter((p) => p.state === state);
  }

  /**
   * Open, and `opensAt ≤ now < closesAt`.
   */
  isAcceptingVotes(id: number, now: number): boolean {
    const proposal = this._proposals.get(id);
    return (
      proposal !== undefined &&
      proposal.state === "open" &&
      proposal.opensAt <= now &&
      now < proposal.closesAt
    );
  }

  get size(): number {
    return this._proposals.size;
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private _transition(id: number, from: ProposalState, to: ProposalState): Proposal {
    const proposal = this.require(id);
    if (proposal.state !== from) {
      throw new RegistryError(
        "INVALID_TRANSITION",
        `Proposal ${id} cannot move from ${proposal.state} to ${to}`,
      );
    }
    return proposal;
  }
}

function validateDefinition(def: ProposalDefinition): void {
  if (!isUint32(def.id)) {
    throw new RegistryError("INVALID_PROPOSAL", `Proposal id must be a uint32, got ${def.id}`);
  }
  if (!Number.isInteger(def.choiceCount) || def.choiceCount < 1 || def.choiceCount > MAX_CHOICES) {
    throw new RegistryError(
      "INVALID_PROPOSAL",
      `Proposal ${def.id} choiceCount must be between 1 and ${MAX_CHOICES}, got ${def.choiceCount}`,
    );
  }
  if (!Number.isInteger(def.opensAt) || !Number.isInteger(def.closesAt) || def.opensAt < 0) {
    throw new RegistryError("INVALID_PROPOSAL", `Proposal ${def.id} window bounds must be integer seconds`);
  }
  if (def.opensAt >= def.closesAt) {
    throw new RegistryError(
      "INVALID_PROPOSAL",
      `Proposal ${def.id} must open before it closes (opensAt ${def.opensAt}, closesAt ${def.closesAt})`,
    );
  }
  if (def.treasuryRoute.trim().length === 0) {
    throw new RegistryError("INVALID_PROPOSAL", `Proposal ${def.id} needs a treasury route`);
  }
}
