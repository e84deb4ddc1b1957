/**
 * Types for the HTTP API layer.
 *
 * Request/response structures for the REST API.
 */

import type { UserField, UserListRow } from '../types/UserRecord.js';
import type { PaginationInfo } from '../intake/pagination.js';
import type { LogLevel } from '../config/types.js';

// ============================================================================
// Error Response
// ============================================================================

export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'VALIDATION_ERROR'
  | 'STORAGE_UNAVAILABLE'
  | 'STORAGE_CLOSED'
  | 'FETCH_FAILED'
  | 'INTERNAL_ERROR';

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: ApiErrorCode;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// User Endpoints
// ============================================================================

/**
 * Response after a successful submission.
 */
export interface SubmitUserResponse {
  /** Assigned record id */
  id: number;
  /** Number of stored records after the insert */
  total: number;
}

/**
 * Query parameters for GET /users.
 */
export interface ListUsersQuery {
  /** Page number (1-indexed) */
  page?: string;
}

/**
 * One page of the listing.
 */
export interface ListUsersResponse {
  rows: UserListRow[];
  pagination: PaginationInfo;
}

/**
 * Response of POST /users/prefill.
 */
export interface PrefillResponse {
  values: Record<UserField, string>;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  components: {
    store: { open: boolean; path: string };
  };
}

// ============================================================================
// Server
// ============================================================================

/**
 * Server options.
 */
export interface ServerOptions {
  /** Port to listen on (default: 3001) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Allowed CORS origins (default: ['*']) */
  corsOrigins?: string[];
  /** Log level (default: 'info') */
  logLevel?: LogLevel;
}
