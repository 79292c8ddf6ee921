// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Clock, Directory and Mailer Stand-ins
// ═══════════════════════════════════════════════════════════════════════════════

import { vi } from 'vitest';
import type { AccountDirectory, AccountSource, Clock, LegacyValidity, MailMessage, Mailer } from '../types.js';

export const T0 = Date.UTC(2025, 0, 1);
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
export const WEEK = 7 * DAY;
export const PERIOD = 6 * WEEK;

export const LINK_A = 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
export const LINK_B = 'bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

export interface TestClock extends Clock {
  set(ms: number): void;
  advance(ms: number): void;
}

export function createTestClock(start = T0): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => { current = ms; },
    advance: (ms) => { current += ms; },
  };
}

export function createMockDirectory(
  addresses: Record<string, readonly string[]>,
  names: Record<string, string> = {}
) {
  return {
    getEmailAddresses: vi.fn(async (accountId: string): Promise<readonly string[]> => addresses[accountId] ?? []),
    getDisplayName: vi.fn(async (accountId: string): Promise<string | null> => names[accountId] ?? null),
  } satisfies AccountDirectory;
}

export function createMockMailer() {
  return {
    send: vi.fn(async (_message: MailMessage): Promise<boolean> => true),
  } satisfies Mailer;
}

export function createAccountSource(
  accountIds: readonly string[],
  legacy: readonly LegacyValidity[] = []
) {
  return {
    listAccountIds: vi.fn(async (offset: number, limit: number): Promise<readonly string[]> =>
      accountIds.slice(offset, offset + limit)),
    getLegacyValidity: vi.fn(async (ids: readonly string[]): Promise<readonly LegacyValidity[]> =>
      legacy.filter((row) => ids.includes(row.accountId))),
  } satisfies AccountSource;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve: (value) => resolve(value) };
}
