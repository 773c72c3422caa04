import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { GatewayContext, createGatewayContext } from './gateway-context.js';
import { FakeAgentTransport, FakeChartRenderer, FakeQueryService, issueRows, testConfig } from '../testing/fakes.js';

const MINUTE = 60 * 1000;

describe('GatewayContext', () => {
  let chartDir: string;
  let now: number;
  let transport: FakeAgentTransport;
  let queries: FakeQueryService;
  let context: GatewayContext;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    chartDir = await mkdtemp(path.join(tmpdir(), 'gateway-context-'));
    now = 10 * 60 * MINUTE;
    transport = new FakeAgentTransport();
    queries = new FakeQueryService();
    queries.rows = issueRows(1);
    context = createGatewayContext(
      testConfig(chartDir),
      { agentTransport: transport, queryService: queries, chartRenderer: new FakeChartRenderer() },
      { clock: () => now }
    );
  });

  afterEach(async () => {
    await context.stop(0);
    await rm(chartDir, { recursive: true, force: true });
  });

  it('reaps idle sessions, emptied rate windows and expired bundles', async () => {
    const start = now;
    await context.handleChat({ message: 'open bugs', sessionId: 'idle' });
    queries.rows = issueRows(60);
    await context.handleChat({ message: 'all bugs', sessionId: 'idle' });

    now = start + 2 * MINUTE;
    queries.rows = issueRows(1);
    await context.handleChat({ message: 'open bugs', sessionId: 'active' });

    expect(context.sweep(now)).toEqual({
      sessionsRemoved: 0,
      rateWindowsRemoved: 1,
      bundlesRemoved: 0,
      activeSessions: 2,
      storedSummaries: 1,
    });

    expect(context.sweep(start + 30 * MINUTE + 1)).toMatchObject({ sessionsRemoved: 1, activeSessions: 1 });
    expect(context.sessions.has('idle')).toBe(false);
    expect(context.sessions.has('active')).toBe(true);

    expect(context.sweep(start + 60 * MINUTE + 1)).toMatchObject({ bundlesRemoved: 1, storedSummaries: 0 });
  });

  it('is idempotent when swept twice', async () => {
    await context.handleChat({ message: 'open bugs', sessionId: 's1' });
    const later = now + 31 * MINUTE;

    expect(context.sweep(later).sessionsRemoved).toBe(1);
    expect(context.sweep(later)).toEqual({
      sessionsRemoved: 0,
      rateWindowsRemoved: 0,
      bundlesRemoved: 0,
      activeSessions: 0,
      storedSummaries: 0,
    });
  });

  it('deletes a session together with its rate window', async () => {
    for (let i = 0; i < 30; i++) {
      await context.handleChat({ message: 'open bugs', sessionId: 's1' });
    }

    expect(context.deleteSession('s1')).toBe(true);
    expect(context.deleteSession('s1')).toBe(false);

    const outcome = await context.handleChat({ message: 'open bugs', sessionId: 's1' });
    expect(outcome.status).toBe('ok');
    expect(context.sessions.history('s1')).toHaveLength(2);
  });

  it('schedules and cancels the sweep', async () => {
    context.start();
    expect(context.isRunning).toBe(true);

    await context.stop();
    expect(context.isRunning).toBe(false);
  });

  it('runs the sweep on its interval', async () => {
    vi.useFakeTimers();
    try {
      const sweep = vi.spyOn(context, 'sweep');
      context.start();

      await vi.advanceTimersByTimeAsync(30 * MINUTE);

      expect(sweep).toHaveBeenCalledTimes(1);
    } finally {
      await context.stop(0);
      vi.useRealTimers();
    }
  });

  it('waits for chat requests in flight before stopping', async () => {
    let release: () => void = () => undefined;
    transport.responder = async (request) => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      return [{ type: 'chunk', text: `SELECT 1 -- ${request.sessionId}` }];
    };

    const pending = context.handleChat({ message: 'open bugs', sessionId: 's1' });
    await vi.waitFor(() => expect(transport.requests).toHaveLength(1));
    expect(context.load().inFlightRequests).toBe(1);

    const stopping = context.stop(5_000);
    release();
    await stopping;

    expect(context.load().inFlightRequests).toBe(0);
    await expect(pending).resolves.toMatchObject({ status: 'ok' });
  });
});
