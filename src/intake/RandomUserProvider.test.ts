/**
 * Tests for the random-user provider client.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  RandomUserProvider,
  FetchFailedError,
  DEFAULT_PROVIDER_URL,
  toFormValues,
  type FetchFn,
} from './RandomUserProvider.js';

const sampleUser = {
  gender: 'female',
  name: { title: 'Ms', first: 'Test', last: 'Person' },
  location: {
    street: { number: 42, name: 'Example Street' },
    city: 'Sampletown',
    state: 'Somestate',
    country: 'Nowhere',
    postcode: 12345,
  },
  email: 'test.person@example.com',
  login: { username: 'testperson', password: 'placeholder' },
  dob: { date: '1985-03-09T22:15:00.000Z', age: 39 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function fakeFetch(response: Response): FetchFn {
  return vi.fn(() => Promise.resolve(response));
}

describe('RandomUserProvider', () => {
  it('maps the first result onto form values', async () => {
    const provider = new RandomUserProvider({
      fetch: fakeFetch(jsonResponse({ results: [sampleUser], info: { seed: 'abc' } })),
    });

    await expect(provider.fetchUser()).resolves.toEqual({
      name: 'Test Person',
      email: 'test.person@example.com',
      birthDate: '1985-03-09',
      address: '42 Example Street, Sampletown, Somestate, Nowhere',
      password: 'placeholder',
    });
  });

  it('requests the default endpoint once', async () => {
    const fetchFn = fakeFetch(jsonResponse({ results: [sampleUser] }));
    const provider = new RandomUserProvider({ fetch: fetchFn });

    await provider.fetchUser();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(DEFAULT_PROVIDER_URL, expect.anything());
  });

  it('uses a configured endpoint', async () => {
    const fetchFn = fakeFetch(jsonResponse({ results: [sampleUser] }));
    const provider = new RandomUserProvider({ url: 'http://localhost:9999/api/', fetch: fetchFn });

    await provider.fetchUser();

    expect(fetchFn).toHaveBeenCalledWith('http://localhost:9999/api/', expect.anything());
  });

  it('fails on a non-200 response', async () => {
    const provider = new RandomUserProvider({
      fetch: fakeFetch(jsonResponse({ error: 'down' }, 503)),
    });

    const err = await provider.fetchUser().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchFailedError);
    expect(err).toMatchObject({
      code: 'FETCH_FAILED',
      status: 503,
      message: 'Random user request failed: HTTP 503',
    });
  });

  it('treats other 2xx statuses as failures', async () => {
    const provider = new RandomUserProvider({
      fetch: fakeFetch(new Response(null, { status: 204 })),
    });

    await expect(provider.fetchUser()).rejects.toThrow('Random user request failed: HTTP 204');
  });

  it('fails when the network request rejects', async () => {
    const provider = new RandomUserProvider({
      fetch: vi.fn(() => Promise.reject(new Error('connection refused'))),
    });

    await expect(provider.fetchUser()).rejects.toThrow(
      'Random user request failed: connection refused'
    );
  });

  it('fails on an empty results array', async () => {
    const provider = new RandomUserProvider({
      fetch: fakeFetch(jsonResponse({ results: [] })),
    });

    await expect(provider.fetchUser()).rejects.toBeInstanceOf(FetchFailedError);
  });

  it('fails when a required field is missing', async () => {
    const { login: _login, ...withoutLogin } = sampleUser;
    const provider = new RandomUserProvider({
      fetch: fakeFetch(jsonResponse({ results: [withoutLogin] })),
    });

    await expect(provider.fetchUser()).rejects.toThrow(/results\.0\.login/);
  });

  it('fails on a body that is not JSON', async () => {
    const provider = new RandomUserProvider({
      fetch: fakeFetch(new Response('<html>', { status: 200 })),
    });

    await expect(provider.fetchUser()).rejects.toThrow('Random user response is not valid JSON');
  });
});

describe('toFormValues', () => {
  it('accepts a string street number', () => {
    const values = toFormValues({
      ...sampleUser,
      location: { ...sampleUser.location, street: { number: '7B', name: 'Side Road' } },
    });

    expect(values.address).toBe('7B Side Road, Sampletown, Somestate, Nowhere');
  });

  it('rejects an unparseable birth date', () => {
    expect(() => toFormValues({ ...sampleUser, dob: { date: 'yesterday' } })).toThrow(FetchFailedError);
  });
});
