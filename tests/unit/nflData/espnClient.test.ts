import { describe, it, expect } from 'vitest';
import { EspnClient } from '../../../src/utils/nfl/espnClient';
import { JobCancelledError, ProviderError } from '../../../src/errors';
import { silentLogger } from '../../helpers/fakes';

type Step = Response | Error;

/** fetch stand-in that replays a fixed sequence of responses. */
function scriptedFetch(steps: Step[]) {
  const urls: string[] = [];
  const fetchImpl = async (input: string | URL | Request): Promise<Response> => {
    urls.push(String(input));
    const step = steps.shift();
    if (!step) throw new Error('no scripted response left');
    if (step instanceof Error) throw step;
    return step;
  };
  return { urls, fetchImpl };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function clientFor(steps: Step[]) {
  const { urls, fetchImpl } = scriptedFetch(steps);
  const delays: number[] = [];
  const client = new EspnClient({
    baseUrl: 'https://espn.test/nfl',
    timeoutMs: 5000,
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterPercent: 0 },
    fetchImpl,
    sleep: async (ms) => void delays.push(ms),
    logger: silentLogger(),
  });
  return { client, urls, delays };
}

describe('EspnClient', () => {
  it('builds scoreboard URLs from the defined query fields', () => {
    const { client } = clientFor([]);
    expect(client.buildScoreboardUrl({ dates: 2025, seasontype: 2, week: 1 })).toBe(
      'https://espn.test/nfl/scoreboard?dates=2025&seasontype=2&week=1',
    );
    expect(client.buildScoreboardUrl({ week: undefined })).toBe('https://espn.test/nfl/scoreboard');
  });

  it('returns the parsed body on success', async () => {
    const { client, urls } = clientFor([json({ events: [] })]);
    await expect(client.getScoreboard({ week: 2 })).resolves.toEqual({ events: [] });
    expect(urls).toEqual(['https://espn.test/nfl/scoreboard?week=2']);
  });

  // ─── Transient failures ───────────────────────────────────────────────────

  it('retries 429 and 5xx responses with exponential backoff', async () => {
    const { client, delays } = clientFor([json({}, 429), json({}, 502), json({ events: [1] })]);
    await expect(client.getScoreboard()).resolves.toEqual({ events: [1] });
    expect(delays).toEqual([100, 200]);
  });

  it('retries network errors and malformed bodies', async () => {
    const { client, urls } = clientFor([
      new TypeError('fetch failed'),
      new Response('<html>', { status: 200 }),
      json({ events: [] }),
    ]);
    await expect(client.getScoreboard()).resolves.toEqual({ events: [] });
    expect(urls).toHaveLength(3);
  });

  it('marks the error exhausted once retries run out', async () => {
    const { client, delays } = clientFor([json({}, 503), json({}, 503), json({}, 503)]);

    const err = await client.getScoreboard().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      kind: 'transient',
      status: 503,
      attempts: 3,
      exhausted: true,
      message: 'ESPN scoreboard unavailable after 3 attempts: ESPN responded 503',
    });
    expect(delays).toEqual([100, 200]);
  });

  // ─── Permanent failures & cancellation ────────────────────────────────────

  it('surfaces other 4xx responses at once', async () => {
    const { client, urls, delays } = clientFor([json({}, 404)]);

    const err = await client.getScoreboard().catch((e: unknown) => e);

    expect(err).toMatchObject({ kind: 'permanent', status: 404, attempts: 1, exhausted: false });
    expect(urls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('does not call the network when already cancelled', async () => {
    const { client, urls } = clientFor([json({ events: [] })]);
    const controller = new AbortController();
    controller.abort();

    await expect(client.getScoreboard({}, controller.signal)).rejects.toBeInstanceOf(JobCancelledError);
    expect(urls).toEqual([]);
  });
});
