/**
 * UserHandlers — HTTP handlers for the intake workflow.
 *
 * Thin wrappers around IntakeService: submit, paged listing, prefill.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { IntakeService } from '../../intake/IntakeService.js';
import { FetchFailedError } from '../../intake/RandomUserProvider.js';
import { fieldErrorsToObject } from '../../intake/validators.js';
import { paginate, DEFAULT_PAGE_SIZE } from '../../intake/pagination.js';
import { isStorageError } from '../../store/errors.js';
import { USER_FIELDS, emptyFormValues, toListRow } from '../../types/UserRecord.js';
import type { UserFormValues } from '../../types/UserRecord.js';
import type {
  ApiError,
  ListUsersQuery,
  ListUsersResponse,
  PrefillResponse,
  SubmitUserResponse,
} from '../types.js';

/**
 * Translate a store or unexpected failure into an error response.
 */
function failure(err: unknown, action: string, request: FastifyRequest, reply: FastifyReply): ApiError {
  const message = err instanceof Error ? err.message : String(err);

  if (isStorageError(err)) {
    request.log.error({ err }, `Storage failure during ${action}`);
    reply.status(503);
    return { error: err.code, message: `Failed to ${action}: ${message}` };
  }

  request.log.error({ err }, `Unexpected failure during ${action}`);
  reply.status(500);
  return { error: 'INTERNAL_ERROR', message: `Failed to ${action}: ${message}` };
}

type BodyParseResult =
  | { ok: true; values: UserFormValues }
  | { ok: false; message: string };

/**
 * Read the five form fields from a request body. Absent fields are empty.
 */
export function parseUserBody(body: unknown): BodyParseResult {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, message: 'request body must be a JSON object' };
  }

  const values = emptyFormValues();
  for (const field of USER_FIELDS) {
    const value: unknown = Reflect.get(body, field);
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'string') {
      return { ok: false, message: `${field} must be a string` };
    }
    values[field] = value;
  }
  return { ok: true, values };
}

/**
 * Create user handlers bound to an IntakeService.
 */
export function createUserHandlers(service: IntakeService, pageSize = DEFAULT_PAGE_SIZE) {
  return {
    /**
     * GET /users
     * One page of stored users (name, email, birth date).
     */
    async listUsers(
      request: FastifyRequest<{ Querystring: ListUsersQuery }>,
      reply: FastifyReply
    ): Promise<ListUsersResponse | ApiError> {
      const page = request.query.page === undefined ? 1 : Number(request.query.page);
      if (!Number.isInteger(page) || page < 1) {
        reply.status(400);
        return { error: 'BAD_REQUEST', message: 'page must be a positive integer' };
      }

      try {
        const records = await service.listRecords();
        const { items, pagination } = paginate(records.map(toListRow), page, pageSize);
        return { rows: items, pagination };
      } catch (err) {
        return failure(err, 'list users', request, reply);
      }
    },

    /**
     * POST /users
     * Validate and store a user.
     */
    async submitUser(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<SubmitUserResponse | ApiError> {
      const parsed = parseUserBody(request.body);
      if (!parsed.ok) {
        reply.status(400);
        return { error: 'BAD_REQUEST', message: parsed.message };
      }

      try {
        const result = await service.submit(parsed.values);

        if (!result.success) {
          reply.status(400);
          return {
            error: 'VALIDATION_ERROR',
            message: `Invalid fields: ${[...result.fieldErrors.keys()].join(', ')}`,
            details: fieldErrorsToObject(result.fieldErrors),
          };
        }

        request.log.info({ id: result.id }, 'User registered');
        reply.status(201);
        return { id: result.id, total: result.records.length };
      } catch (err) {
        return failure(err, 'register user', request, reply);
      }
    },

    /**
     * POST /users/prefill
     * Values from the random-user provider. Nothing is stored.
     */
    async prefillUser(
      request: FastifyRequest,
      reply: FastifyReply
    ): Promise<PrefillResponse | ApiError> {
      try {
        const values = await service.prefill();
        return { values };
      } catch (err) {
        if (err instanceof FetchFailedError) {
          request.log.warn({ status: err.status }, err.message);
          reply.status(502);
          return { error: err.code, message: err.message };
        }
        return failure(err, 'fetch user from provider', request, reply);
      }
    },
  };
}

export type UserHandlers = ReturnType<typeof createUserHandlers>;
