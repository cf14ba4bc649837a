import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBody(call: number): Array<Record<string, unknown>> {
  return JSON.parse(String(mockFetch.mock.calls[call][1]?.body));
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 60_000,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- buffering ---

  it('should buffer events without sending until flush', () => {
    provider.info('hello');
    provider.warn('world');
    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  // --- flush() ---

  it('should send buffered events to Axiom on flush', async () => {
    provider.info('one');
    provider.warn('two', { key: 'val' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBody(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one', service: 'field-clone' });
    expect(body[1]).toMatchObject({ level: 'warn', message: 'two', fields: { key: 'val' } });
    expect(body[0].timestamp).toBeDefined();
  });

  it('should tag events with a custom service name', async () => {
    const tagged = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      service: 'clone-worker',
      flushIntervalMs: 0,
    });
    tagged.info('tagged');
    await tagged.flush();

    expect(sentBody(0)[0].service).toBe('clone-worker');
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(provider.pending).toBe(0);
  });

  // --- levels ---

  it('should drop debug events by default', async () => {
    provider.debug('noise');
    provider.info('signal');
    await provider.flush();

    const body = sentBody(0);
    expect(body).toHaveLength(1);
    expect(body[0].message).toBe('signal');
  });

  it('should keep debug events when minLevel is debug', async () => {
    const verbose = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      minLevel: 'debug',
      flushIntervalMs: 0,
    });
    verbose.debug('d');
    await verbose.flush();

    expect(sentBody(0)[0]).toMatchObject({ level: 'debug', message: 'd' });
  });

  // --- auto-flush on threshold ---

  it('should auto-flush when buffer reaches threshold', async () => {
    provider.info('1');
    provider.info('2');
    provider.info('3');
    provider.info('4');
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5');
    await new Promise((r) => setTimeout(r, 10));
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sentBody(0)).toHaveLength(5);
  });

  // --- buffer cap ---

  it('should discard the oldest events beyond maxBufferSize', async () => {
    mockFetch.mockResolvedValue(new Response('unavailable', { status: 503 }));
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      maxBufferSize: 3,
      flushThreshold: 100,
      flushIntervalMs: 0,
    });

    capped.info('a');
    capped.info('b');
    capped.info('c');
    capped.info('d');
    expect(capped.pending).toBe(3);

    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    await capped.flush();
    expect(sentBody(0).map((e) => e.message)).toEqual(['b', 'c', 'd']);
  });

  // --- error resilience ---

  it('should not throw when Axiom returns an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');
    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.pending).toBe(1);
  });

  it('should retain events when fetch rejects so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const body = sentBody(1);
    expect(body).toHaveLength(1);
    expect(body[0].message).toBe('important');
  });

  // --- log() with full event ---

  it('should keep a provided timestamp and fields', async () => {
    const ts = '2026-01-20T00:00:00.000Z';
    provider.log({ level: 'warn', message: 'custom', timestamp: ts, fields: { x: 1 } });
    await provider.flush();

    expect(sentBody(0)[0]).toMatchObject({
      level: 'warn',
      message: 'custom',
      timestamp: ts,
      fields: { x: 1 },
    });
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- disabled mode (no token) ---

  it('should no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.flush();
    expect(mockFetch).not.toHaveBeenCalled();
    await disabled.dispose();
  });
});
