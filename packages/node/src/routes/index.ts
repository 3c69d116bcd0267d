/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createDeliveryRoutes, TRANSPORT_ADDRESS_HEADER } from "./deliveries.js";
export { createSignedVoteRoutes } from "./signed-votes.js";
export { createOracleRoutes } from "./oracle.js";
export { createProposalRoutes } from "./proposals.js";
export { createEventRoutes } from "./events.js";
