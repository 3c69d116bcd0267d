/**
 * Proposal Types
 *
 * Proposals are the only thing a vote can target. They are created by an
 * administrator, opened, closed (explicitly or when the window ends) and
 * finally archived. They are never deleted.
 *
 * All timestamps are ledger time: integer unix seconds taken from the
 * settlement ledger's clock, never a local wall clock.
 */

/**
 * Proposal lifecycle state.
 *
 * draft → open → closed → archived
 */
export type ProposalState = "draft" | "open" | "closed" | "archived";

/**
 * How a proposal accepts votes.
 *
 * - payment: weight comes from value delivered by the transport
 * - identity: weight comes from a signed, externally verified submission
 */
export type ProposalMode = "payment" | "identity";

/**
 * What an administrator supplies to create a proposal.
 */
export interface ProposalDefinition {
  /** uint32 proposal identifier, also carried in vote memos */
  readonly id: number;

  /** Number of choices; valid choice ids are 0..choiceCount-1 */
  readonly choiceCount: number;

  /** Ledger time (seconds) from which votes are accepted */
  readonly opensAt: number;

  /** Ledger time (seconds) at which voting ends (exclusive) */
  readonly closesAt: number;

  /** Destination for value whose delivery could not be tallied */
  readonly treasuryRoute: string;

  /** Voting mode. Default: "payment" */
  readonly mode?: ProposalMode | undefined;

  /** Optional human-readable title */
  readonly title?: string | undefined;
}

/**
 * A registered proposal.
 */
export interface Proposal {
  readonly id: number;
  readonly choiceCount: number;
  readonly opensAt: number;
  readonly closesAt: number;
  readonly treasuryRoute: string;
  readonly mode: ProposalMode;
  readonly state: ProposalState;
  readonly title?: string | undefined;

  /** Ledger time when the proposal was created */
  readonly createdAt: number;

  /** Ledger time of the draft → open transition */
  readonly openedAt?: number | undefined;

  /** Ledger time of the open → closed transition */
  readonly closedAt?: number | undefined;

  /** Ledger time of the closed → archived transition */
  readonly archivedAt?: number | undefined;
}
