/**
 * Test Helpers for file task suites
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Logger } from '../types.js';

export async function createTempDir(prefix = 'fsflow-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Logger that keeps every message as `LEVEL: message`
 */
export function createRecordingLogger(): Logger & { logs: string[] } {
  const logs: string[] = [];
  return {
    logs,
    error: (msg: string) => logs.push(`ERROR: ${msg}`),
    warn: (msg: string) => logs.push(`WARN: ${msg}`),
    info: (msg: string) => logs.push(`INFO: ${msg}`),
    debug: (msg: string) => logs.push(`DEBUG: ${msg}`),
  };
}
