import pino, { type Logger } from 'pino';
import type { IdentityCache } from '../src/cache/types.js';
import type { IdentityRecord } from '../src/identity/types.js';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * pino logger writing parsed JSON lines into an array.
 */
export function createCapturingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

export const silentLogger = pino({ level: 'silent' });

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
  });
}

export function makeIdentity(overrides: Partial<IdentityRecord> = {}): IdentityRecord {
  return {
    expiresAt: '2030-01-01T00:00:00.000000Z',
    issuedAt: '2029-12-31T23:00:00.000000Z',
    user: {
      id: 'u1',
      name: 'alice',
      email: 'alice@example.test',
      enabled: true,
      domainId: 'd1',
      domainName: 'Default',
    },
    ...overrides,
  };
}

/**
 * In-process cache recording every call, for asserting what the middleware
 * read and wrote.
 */
export class RecordingCache implements IdentityCache {
  readonly entries = new Map<string, IdentityRecord>();
  readonly sets: Array<{ token: string; identity: IdentityRecord; ttlMs: number }> = [];
  gets = 0;

  async get(token: string): Promise<IdentityRecord | undefined> {
    this.gets++;
    return this.entries.get(token);
  }

  async set(token: string, identity: IdentityRecord, ttlMs: number): Promise<void> {
    this.sets.push({ token, identity, ttlMs });
    this.entries.set(token, identity);
  }
}
