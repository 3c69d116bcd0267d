/**
 * @tallybridge/settlement: Value routing.
 *
 * Value arriving with a delivery must leave the call accounted for:
 * - accepted votes retain it in the proposal's escrow account
 * - rejected deliveries forward it to the proposal's treasury route, or
 *   to the global fallback route when no proposal can be identified
 *
 * The router records movements; actually moving funds on the settlement
 * ledger is the host's concern.
 */

export type MovementKind = "escrow" | "forward";

export interface ValueMovement {
  readonly receiptId: string;
  readonly kind: MovementKind;
  readonly route: string;
  readonly asset: string;

  /** Amount as delivered (base units when well-formed) */
  readonly amount: string;
}

export interface ValueRouter {
  move(movement: ValueMovement): void;
}

export function escrowRoute(proposalId: number): string {
  return `escrow:${proposalId}`;
}

const BASE_UNITS = /^(0|[1-9]\d*)$/;

/**
 * Router that keeps every movement and per-route, per-asset balances.
 */
export class InMemoryValueRouter implements ValueRouter {
  private readonly _movements: ValueMovement[] = [];
  private readonly _balances = new Map<string, bigint>();

  move(movement: ValueMovement): void {
    this._movements.push(movement);
    if (BASE_UNITS.test(movement.amount)) {
      const key = balanceKey(movement.route, movement.asset);
      this._balances.set(key, (this._balances.get(key) ?? 0n) + BigInt(movement.amount));
    }
  }

  movements(): readonly ValueMovement[] {
    return this._movements;
  }

  movementsFor(receiptId: string): readonly ValueMovement[] {
    return this._movements.filter((m) => m.receiptId === receiptId);
  }

  balanceOf(route: string, asset: string): bigint {
    return this._balances.get(balanceKey(route, asset)) ?? 0n;
  }
}

function balanceKey(route: string, asset: string): string {
  return `${route}\u0000${asset}`;
}
