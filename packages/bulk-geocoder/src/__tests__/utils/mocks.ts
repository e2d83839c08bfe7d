/**
 * Test doubles shared by the unit tests
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';
import type { Clock } from '../../core/clock.js';
import type { GeocodeResult } from '../../core/types.js';
import type { EngineLogger, LogLevel, LogMetadata } from '../../core/utils/logger.js';
import type { GeocodeClient } from '../../providers/provider-client.js';
import type { ProviderId } from '../../providers/types.js';

// ============================================================================
// Time
// ============================================================================

/**
 * Clock whose sleep advances time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
  }

  advance(ms: number): void {
    this.current += Math.max(0, ms);
  }
}

// ============================================================================
// Logging
// ============================================================================

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

/**
 * Logger that records entries for assertions
 */
export class RecordingLogger implements EngineLogger {
  readonly entries: LogEntry[] = [];

  debug(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'debug', message, metadata });
  }

  info(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'info', message, metadata });
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'warn', message, metadata });
  }

  error(message: string, metadata?: LogMetadata): void {
    this.entries.push({ level: 'error', message, metadata });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

// ============================================================================
// Providers
// ============================================================================

/**
 * In-process geocode client driven by a resolver function
 */
export class StubGeocodeClient implements GeocodeClient {
  readonly queries: string[] = [];

  constructor(
    private readonly resolver: (query: string, call: number) => GeocodeResult | Promise<GeocodeResult>,
    readonly providerId: ProviderId = 'nominatim'
  ) {}

  get callCount(): number {
    return this.queries.length;
  }

  async geocode(query: string): Promise<GeocodeResult> {
    this.queries.push(query);
    return this.resolver(query, this.queries.length);
  }
}

// ============================================================================
// HTTP
// ============================================================================

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type FetchMock = Mock<FetchFn>;

/**
 * Install a fetch mock answering every call with the given responses in turn
 * (the last one repeats)
 */
export function stubFetch(...responses: Array<Response | Error>): FetchMock {
  let call = 0;
  const fetchMock = vi.fn<FetchFn>(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    if (next === undefined) {
      throw new Error('stubFetch called without responses');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next.clone();
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * URL passed to the n-th fetch call (0-based)
 */
export function requestedUrl(fetchMock: FetchMock, call = 0): URL {
  const url = fetchMock.mock.calls[call]?.[0];
  if (typeof url !== 'string') {
    throw new Error(`fetch call ${call} has no URL`);
  }
  return new URL(url);
}

// ============================================================================
// Files
// ============================================================================

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'bulk-geocoder-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeText(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}

export async function readText(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/**
 * CSV with an `id` and `address` column and `count` rows
 */
export function addressCsv(count: number): string {
  const lines = ['id,address'];
  for (let i = 0; i < count; i++) {
    lines.push(`${i},${i} Main St`);
  }
  return `${lines.join('\n')}\n`;
}
