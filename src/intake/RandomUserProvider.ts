/**
 * Client for the public random-user API, used to pre-fill the form.
 *
 * Uses native fetch. One request per call: no timeout, no retry.
 * Nothing fetched here is persisted.
 */

import { z } from 'zod';
import type { UserFormValues } from '../types/UserRecord.js';
import { formatIsoDate } from './validators.js';

export const DEFAULT_PROVIDER_URL = 'https://randomuser.me/api/';

/**
 * The provider failed to deliver a usable user.
 */
export class FetchFailedError extends Error {
  readonly code = 'FETCH_FAILED';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchFailedError';
  }
}

const RandomUserSchema = z.object({
  name: z.object({
    first: z.string(),
    last: z.string(),
  }),
  email: z.string(),
  dob: z.object({
    date: z.string(),
  }),
  location: z.object({
    street: z.object({
      number: z.union([z.number(), z.string()]),
      name: z.string(),
    }),
    city: z.string(),
    state: z.string(),
    country: z.string(),
  }),
  login: z.object({
    password: z.string(),
  }),
});

const RandomUserResponseSchema = z.object({
  results: z.array(RandomUserSchema).min(1),
});

export type RandomUser = z.infer<typeof RandomUserSchema>;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface RandomUserProviderConfig {
  /** Endpoint URL (default: https://randomuser.me/api/) */
  url?: string;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
}

/**
 * Source of pre-fill values for the intake form.
 */
export interface UserProvider {
  fetchUser(): Promise<UserFormValues>;
}

/**
 * Map a provider user onto the form fields.
 */
export function toFormValues(user: RandomUser): UserFormValues {
  const dob = new Date(user.dob.date);
  if (Number.isNaN(dob.getTime())) {
    throw new FetchFailedError(`Provider returned an invalid birth date: ${user.dob.date}`);
  }

  const { street, city, state, country } = user.location;

  return {
    name: `${user.name.first} ${user.name.last}`,
    email: user.email,
    birthDate: formatIsoDate(dob),
    address: `${street.number} ${street.name}, ${city}, ${state}, ${country}`,
    password: user.login.password,
  };
}

export class RandomUserProvider implements UserProvider {
  private readonly url: string;
  private readonly fetchFn: FetchFn;

  constructor(config: RandomUserProviderConfig = {}) {
    this.url = config.url ?? DEFAULT_PROVIDER_URL;
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  async fetchUser(): Promise<UserFormValues> {
    let res: Response;
    try {
      res = await this.fetchFn(this.url, { headers: { Accept: 'application/json' } });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new FetchFailedError(`Random user request failed: ${message}`, undefined, { cause: err });
    }

    if (res.status !== 200) {
      throw new FetchFailedError(`Random user request failed: HTTP ${res.status}`, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new FetchFailedError('Random user response is not valid JSON', res.status, { cause: err });
    }

    const parsed = RandomUserResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new FetchFailedError(`Random user response has unexpected shape (${where})`, res.status);
    }

    const [user] = parsed.data.results;
    if (!user) {
      throw new FetchFailedError('Random user response has no results', res.status);
    }
    return toFormValues(user);
  }
}

/**
 * Create a RandomUserProvider.
 */
export function createRandomUserProvider(config: RandomUserProviderConfig = {}): RandomUserProvider {
  return new RandomUserProvider(config);
}
