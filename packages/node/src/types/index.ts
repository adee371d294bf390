/**
 * Type barrel — re-exports all public types from @vestlock/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  InitiateLockSchema,
  TransferControlSchema,
  ListEventsQuerySchema,
  lockReceiptView,
  releaseReceiptView,
  sweepReceiptView,
  eventView,
} from "./dto.js";
export type {
  InitiateLockDto,
  TransferControlDto,
  ListEventsQuery,
  LockDetailView,
  LockReceiptView,
  ReleaseReceiptView,
  SweepReceiptView,
  EventView,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type {
  ApiErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  ValidationIssue,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
