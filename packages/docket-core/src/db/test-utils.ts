/**
 * Test utilities for creating in-memory databases with the correct schema.
 */
import type Database from 'libsql';
import { createConnection, MEMORY_DB } from './connection.js';
import { createServices, type DocketServices, type ServiceOptions } from '../services/container.js';

export function createTestDb(): Database.Database {
  return createConnection(MEMORY_DB);
}

/**
 * A manual clock in epoch seconds. Tests advance it explicitly so session
 * boundaries are exact.
 */
export interface TestClock {
  (): number;
  set(ts: number): void;
  advance(secs: number): number;
}

export const TEST_EPOCH = 1_767_225_600; // 2026-01-01T00:00:00Z

export function createTestClock(start: number = TEST_EPOCH): TestClock {
  let current = start;
  return Object.assign(() => current, {
    set(ts: number): void {
      current = ts;
    },
    advance(secs: number): number {
      current += secs;
      return current;
    },
  });
}

export interface TestHarness extends DocketServices {
  db: Database.Database;
  clock: TestClock;
}

export function createTestServices(options: Omit<ServiceOptions, 'clock'> = {}): TestHarness {
  const db = createTestDb();
  const clock = createTestClock();
  return { ...createServices(db, { ...options, clock }), db, clock };
}
