/**
 * Run Context Module
 *
 * Defines the context that flows through a scoring run so that every
 * diagnostic carries the run and document it belongs to.
 *
 * @module @scorecard/core/telemetry/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

// =============================================================================
// Context Types
// =============================================================================

/**
 * Entry point that started the run
 */
export type RunSource = 'cli' | 'library' | 'test';

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Context shared by every log entry emitted during a run
 */
export interface RunContext {
  /** Unique ID of the scoring run */
  runId: string;
  /** Entry point that started the run */
  source: RunSource;
  /** Document currently being scored */
  documentId?: string;
  /** Origin of the current document (usually a file path) */
  documentOrigin?: string;
  /** Timestamp when the context was created */
  timestamp: Date;
}

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const runStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context, if any
 */
export function getCurrentContext(): RunContext | undefined {
  return runStorage.getStore();
}

/**
 * Run a function with a run context
 */
export function runWithContext<T>(ctx: RunContext, fn: () => T): T {
  return runStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Generate a run ID
 */
export function generateRunId(): string {
  return `run-${randomUUID()}`;
}

/**
 * Create a new root run context
 */
export function createRunContext(
  source: RunSource,
  overrides?: Partial<RunContext>
): RunContext {
  return {
    runId: generateRunId(),
    source,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Create a context scoped to a single document of a run
 */
export function createDocumentContext(
  parent: RunContext,
  documentId: string,
  documentOrigin?: string
): RunContext {
  return {
    ...parent,
    documentId,
    documentOrigin,
    timestamp: new Date(),
  };
}
