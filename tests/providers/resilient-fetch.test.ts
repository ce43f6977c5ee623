import { describe, expect, it } from 'vitest';
import { CancellationError, ProviderError } from '../../src/errors/index.js';
import { createCancellationTokenSource } from '../../src/integrations/cancellation.js';
import {
  calculateBackoff,
  parseRetryAfter,
  resilientFetch,
  type FetchLike,
} from '../../src/providers/resilient-fetch.js';

class ScriptedFetch {
  calls = 0;

  constructor(private readonly responses: Array<Response | Error>) {}

  readonly fetch: FetchLike = async () => {
    const next = this.responses[Math.min(this.calls, this.responses.length - 1)];
    this.calls++;
    if (next instanceof Error) throw next;
    return next;
  };
}

const FAST = { baseRetryDelay: 1, maxRetryDelay: 5, maxRetries: 1, maxRetriesFor429: 0 };

describe('resilientFetch', () => {
  it('should return a successful response on the first attempt', async () => {
    const scripted = new ScriptedFetch([new Response('ok', { status: 200 })]);

    const result = await resilientFetch({ url: 'http://test.local', init: {}, providerName: 'test', fetchImpl: scripted.fetch });

    expect(result.attempts).toBe(1);
    expect(await result.response.text()).toBe('ok');
  });

  it('should hand non-retryable errors back as responses', async () => {
    const scripted = new ScriptedFetch([new Response('bad', { status: 400 })]);

    const result = await resilientFetch({ url: 'http://test.local', init: {}, providerName: 'test', fetchImpl: scripted.fetch });

    expect(result.response.status).toBe(400);
    expect(scripted.calls).toBe(1);
  });

  it('should retry transient statuses', async () => {
    const scripted = new ScriptedFetch([new Response('', { status: 503 }), new Response('ok', { status: 200 })]);
    const retries: number[] = [];

    const result = await resilientFetch({
      url: 'http://test.local',
      init: {},
      providerName: 'test',
      networkConfig: FAST,
      fetchImpl: scripted.fetch,
      onRetry: (attempt) => retries.push(attempt),
    });

    expect(result.attempts).toBe(2);
    expect(retries).toEqual([1]);
  });

  it('should throw a server error once retries run out', async () => {
    const scripted = new ScriptedFetch([new Response('', { status: 500 })]);

    const failure = resilientFetch({
      url: 'http://test.local',
      init: {},
      providerName: 'test',
      networkConfig: FAST,
      fetchImpl: scripted.fetch,
    });

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('Server error from test: 500 after 2 attempts');
    expect(scripted.calls).toBe(2);
  });

  it('should wrap network failures after retries', async () => {
    const scripted = new ScriptedFetch([new Error('socket hang up')]);

    await expect(
      resilientFetch({ url: 'http://test.local', init: {}, providerName: 'test', networkConfig: FAST, fetchImpl: scripted.fetch }),
    ).rejects.toThrow('test request failed after 2 attempts: socket hang up');
  });

  it('should not start when already cancelled', async () => {
    const source = createCancellationTokenSource();
    source.cancel('client disconnected');
    const scripted = new ScriptedFetch([new Response('ok')]);

    await expect(
      resilientFetch({
        url: 'http://test.local',
        init: {},
        providerName: 'test',
        fetchImpl: scripted.fetch,
        cancellationToken: source.token,
      }),
    ).rejects.toBeInstanceOf(CancellationError);
    expect(scripted.calls).toBe(0);
  });
});

describe('parseRetryAfter', () => {
  it('should read seconds and HTTP dates', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(new Date(11_000).toUTCString(), 1_000)).toBe(10_000);
  });

  it('should ignore missing, past and malformed values', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter(new Date(500).toUTCString(), 1_000)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });
});

describe('calculateBackoff', () => {
  const config = { baseRetryDelay: 1000, maxRetryDelay: 30000 };

  it('should grow exponentially with jitter', () => {
    expect(calculateBackoff(1, config, 2, () => 0.5)).toBe(1000);
    expect(calculateBackoff(3, config, 2, () => 0.5)).toBe(4000);
    expect(calculateBackoff(1, config, 2, () => 1)).toBe(1250);
    expect(calculateBackoff(2, config, 3, () => 0)).toBe(2250);
  });

  it('should cap at the maximum delay', () => {
    expect(calculateBackoff(10, config, 2, () => 0.5)).toBe(30000);
  });
});
