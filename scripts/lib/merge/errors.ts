import type { RunFailure } from './types.js';

export class ReconcileError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(path ? `${path}: ${reason}` : reason);
    this.name = new.target.name;
    this.path = path;
    this.reason = reason;
  }

  toFailure(): RunFailure {
    return { path: this.path, reason: this.reason };
  }
}

/** Aborts the run before anything is written. */
export class ConfigurationError extends ReconcileError {}

/** One resource file could not be read; the file is skipped. */
export class ParseError extends ReconcileError {}

/** One output file could not be written; the other files are still committed. */
export class SerializationError extends ReconcileError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatFailure(failure: RunFailure): string {
  return `ERROR [${failure.path}]: ${failure.reason}`;
}
