/**
 * Logs settlement outcomes as they are appended to the event log.
 *
 * vote.cast → info, vote.rejected → warn, lifecycle events → info.
 */

import type { Logger } from "pino";
import {
  isVoteCastPayload,
  isVoteRejectedPayload,
  RELAY_EVENTS,
} from "@tallybridge/event-store";
import type { EventStore, StoredEvent, Subscription } from "@tallybridge/event-store";

export function logRelayEvents(events: EventStore, logger: Logger): Subscription {
  return events.subscribeAll((stored) => {
    logEvent(logger, stored);
  });
}

function logEvent(logger: Logger, stored: StoredEvent): void {
  const { type, payload } = stored.event;
  const position = stored.globalPosition;

  if (type === RELAY_EVENTS.VOTE_CAST && isVoteCastPayload(payload)) {
    logger.info(
      {
        position,
        receiptId: payload.receiptId,
        proposalId: payload.proposalId,
        choiceId: payload.choiceId,
        weight: payload.normalizedWeight,
        staleOracle: payload.staleOracle,
      },
      "Vote cast",
    );
    return;
  }

  if (type === RELAY_EVENTS.VOTE_REJECTED && isVoteRejectedPayload(payload)) {
    logger.warn(
      {
        position,
        receiptId: payload.receiptId,
        reason: payload.reason,
        route: payload.route,
        proposalId: payload.proposalId,
      },
      "Vote rejected",
    );
    return;
  }

  logger.info({ position, streamId: stored.streamId, type }, "Relay event");
}
