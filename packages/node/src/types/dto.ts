/**
 * Request DTOs with Zod validation schemas, and the JSON views returned
 * by the routes.
 *
 * Amounts travel as decimal strings; bigint never reaches JSON.stringify.
 */

import { z } from "zod";
import type { LoggedEvent, NativeSweepReceipt } from "@vestlock/timelock";
import type {
  DomainEvent,
  LockReceipt,
  LockStatus,
  ReleaseReceipt,
} from "@vestlock/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Base-unit amount as a decimal string, e.g. "1000". */
export const AmountSchema = z
  .string()
  .regex(/^[0-9]+$/, "Amount must be a decimal string of base units")
  .transform((value) => BigInt(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Lock DTOs
// =============================================================================

export const InitiateLockSchema = z.object({
  amount: AmountSchema,
});

export type InitiateLockDto = z.infer<typeof InitiateLockSchema>;

// =============================================================================
// Controller DTOs
// =============================================================================

export const TransferControlSchema = z.object({
  newController: z.string().min(1),
});

export type TransferControlDto = z.infer<typeof TransferControlSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Views
// =============================================================================

export interface LockDetailView extends LockStatus {
  readonly heldBalance: string;
}

export interface LockReceiptView {
  readonly asset: string;
  readonly amount: string;
  readonly maturity: number;
}

export interface ReleaseReceiptView {
  readonly asset: string;
  readonly amount: string;
  readonly txHash?: string;
}

export interface SweepReceiptView {
  readonly recipient: string;
  readonly amount: string;
  readonly txHash?: string;
}

export interface EventView {
  readonly position: number;
  readonly type: DomainEvent["type"];
  readonly metadata: DomainEvent["metadata"];
  readonly payload: DomainEvent["payload"];
}

export function lockReceiptView(receipt: LockReceipt): LockReceiptView {
  return {
    asset: receipt.asset,
    amount: receipt.amount.toString(),
    maturity: receipt.maturity,
  };
}

export function releaseReceiptView(receipt: ReleaseReceipt): ReleaseReceiptView {
  const view = { asset: receipt.asset, amount: receipt.amount.toString() };
  return receipt.txHash !== undefined ? { ...view, txHash: receipt.txHash } : view;
}

export function sweepReceiptView(receipt: NativeSweepReceipt): SweepReceiptView {
  const view = { recipient: receipt.recipient, amount: receipt.amount.toString() };
  return receipt.txHash !== undefined ? { ...view, txHash: receipt.txHash } : view;
}

export function eventView(entry: LoggedEvent): EventView {
  const { type, metadata, payload } = entry.event;
  return { position: entry.position, type, metadata, payload };
}
