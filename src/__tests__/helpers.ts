/**
 * Shared helpers for the test suites.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PinataError } from '../errors';
import { Logger, LogLevel } from '../observability/logging';

/**
 * Awaits a promise expected to reject with a PinataError and returns it.
 */
export async function captureError(promise: Promise<unknown>): Promise<PinataError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PinataError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

export interface RecordedLog {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger keeping every entry in memory; children share the same record.
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: RecordedLog[] = [],
    private readonly baseContext: Record<string, unknown> = {}
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.record(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.baseContext, ...context });
  }

  private record(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    this.entries.push({ level, message, context: { ...this.baseContext, ...context }, error });
  }
}

/**
 * Creates a scratch directory holding the given files (paths relative to it,
 * `/`-separated). Returns its path.
 */
export async function createTree(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'pinata-client-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, ...relative.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
