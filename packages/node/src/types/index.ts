/**
 * Type barrel: re-exports all public types from @tallybridge/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  TransportDeliverySchema,
  SignedVoteSchema,
  PublishPriceSchema,
  CreateProposalSchema,
  ProposalIdParamSchema,
  ListProposalsQuerySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  TransportDeliveryDto,
  SignedVoteDto,
  PublishPriceDto,
  CreateProposalDto,
  ListProposalsQuery,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
