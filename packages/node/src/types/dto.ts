/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Value-carrying
 * fields of a transport delivery are loose strings: the
 * settlement core decides what a malformed delivery becomes.
 */

import { z } from "zod";

const uint32 = z.number().int().min(0).max(0xffffffff);
const uint8 = z.number().int().min(0).max(0xff);
const ledgerTime = z.number().int().min(0);

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Deliveries & votes
// =============================================================================

export const TransportDeliverySchema = z.object({
  receiptId: z.string(),
  rawAmount: z.string(),
  asset: z.string(),
  /** Memo payload bytes as hex */
  memo: z.string(),
});

export type TransportDeliveryDto = z.infer<typeof TransportDeliverySchema>;

export const SignedVoteSchema = z.object({
  proposalId: uint32,
  choiceId: uint8,
  nonce: uint32,
  signer: z.string().min(1),
  signature: z.string(),
  attestedAmount: z.string().regex(/^(0|[1-9][0-9]*)$/, "must be a base-unit integer"),
  asset: z.string().min(1),
  hint: z.string().regex(/^[0-9a-fA-F]{40}$/, "must be 20 bytes of hex").optional(),
});

export type SignedVoteDto = z.infer<typeof SignedVoteSchema>;

// =============================================================================
// Oracle
// =============================================================================

export const PublishPriceSchema = z.object({
  asset: z.string().min(1),
  price: z.string().min(1),
  /** Defaults to the current ledger time */
  observedAt: ledgerTime.optional(),
});

export type PublishPriceDto = z.infer<typeof PublishPriceSchema>;

// =============================================================================
// Proposals
// =============================================================================

export const CreateProposalSchema = z.object({
  id: uint32,
  choiceCount: z.number().int().min(1).max(255),
  opensAt: ledgerTime,
  closesAt: ledgerTime,
  treasuryRoute: z.string().min(1),
  mode: z.enum(["payment", "identity"]).optional(),
  title: z.string().max(256).optional(),
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const ProposalIdParamSchema = z.coerce.number().int().min(0).max(0xffffffff);

export const ListProposalsQuerySchema = PaginationQuerySchema.extend({
  state: z.enum(["draft", "open", "closed", "archived"]).optional(),
});

export type ListProposalsQuery = z.infer<typeof ListProposalsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
