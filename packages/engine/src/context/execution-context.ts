/**
 * Execution Context
 *
 * Shared key-value state flowing through one pipeline run. Values are plain
 * JSON so the context can be snapshotted into the run report and persisted.
 * Keys are never deleted.
 *
 * @module @pipewright/engine/context/execution-context
 */

import { z } from 'zod';
import { MissingPreconditionError } from '@pipewright/core';

// =============================================================================
// Value Types
// =============================================================================

export type ContextKey = string;

export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export type ContextRecord = { [key: string]: ContextValue };

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(z.string(), ContextValueSchema),
  ])
);

/**
 * Reference to an artifact produced by a step (a written file, a plan)
 */
export const ArtifactRefSchema = z.object({
  kind: z.literal('artifact'),
  uri: z.string(),
  contentType: z.string().optional(),
  sha256: z.string().optional(),
});
export type ArtifactRef = z.infer<typeof ArtifactRefSchema>;

/**
 * Build an artifact reference as a context value
 */
export function artifactRef(uri: string, options: { contentType?: string; sha256?: string } = {}): ContextRecord {
  const ref: ContextRecord = { kind: 'artifact', uri };
  if (options.contentType) ref.contentType = options.contentType;
  if (options.sha256) ref.sha256 = options.sha256;
  return ref;
}

export function isArtifactRef(value: ContextValue | undefined): value is ContextRecord {
  return ArtifactRefSchema.safeParse(value).success;
}

/**
 * Read-only view of a context
 */
export interface ContextReader {
  get(key: ContextKey): ContextValue;
  find(key: ContextKey): ContextValue | undefined;
  has(key: ContextKey): boolean;
}

// =============================================================================
// Execution Context
// =============================================================================

/**
 * One context per run; created by the caller, owned by the runner for the run.
 */
export class ExecutionContext implements ContextReader {
  private readonly values = new Map<ContextKey, ContextValue>();

  constructor(initial: Record<ContextKey, ContextValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  /**
   * Get a value
   *
   * @throws {MissingPreconditionError} If the key is absent
   */
  get(key: ContextKey, stepName?: string): ContextValue {
    const value = this.values.get(key);
    if (value === undefined) {
      throw new MissingPreconditionError(key, { stepName });
    }
    return value;
  }

  find(key: ContextKey): ContextValue | undefined {
    return this.values.get(key);
  }

  has(key: ContextKey): boolean {
    return this.values.has(key);
  }

  /**
   * Append or overwrite a value. The value is copied.
   */
  set(key: ContextKey, value: ContextValue): void {
    this.values.set(key, structuredClone(value));
  }

  /**
   * Apply staged writes
   */
  merge(entries: Iterable<[ContextKey, ContextValue]>): void {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  keys(): ContextKey[] {
    return [...this.values.keys()];
  }

  /**
   * Frozen deep copy for reporting
   */
  snapshot(): Readonly<ContextRecord> {
    const copy: ContextRecord = {};
    for (const [key, value] of this.values) {
      copy[key] = deepFreeze(structuredClone(value));
    }
    return Object.freeze(copy);
  }
}

function deepFreeze<T extends ContextValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
