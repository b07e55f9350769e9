/**
 * Error taxonomy for the indexing and retrieval pipeline.
 *
 * Every error carries the underlying failure as `cause`. Lock contention is
 * not an error: the coordinator reports it as a `busy` result instead.
 */

import type { Logger } from './logger.js';

export class KnowledgeBotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A page fetch from the chat platform failed. Aborts the whole collection;
 * items gathered before the failure are discarded.
 */
export class CollectionError extends KnowledgeBotError {
  readonly sourceId: string;

  constructor(sourceId: string, cause: unknown) {
    super(`Failed to collect messages from ${sourceId}: ${getErrorMessage(cause)}`, { cause });
    this.sourceId = sourceId;
  }
}

/** A platform item was missing required fields or had the wrong shape. */
export class InvalidSourceItemError extends KnowledgeBotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid source item: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** texts, metadatas and ids handed to storage had different lengths. */
export class ArgumentMismatchError extends KnowledgeBotError {
  constructor(lengths: Record<string, number>) {
    const detail = Object.entries(lengths)
      .map(([name, length]) => `${name}=${length}`)
      .join(', ');
    super(`Argument lengths do not match (${detail})`);
  }
}

/**
 * Persistence or embedding backend failure. A subset of the records in the
 * failed call may already be committed.
 */
export class StorageError extends KnowledgeBotError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage operation "${operation}" failed: ${getErrorMessage(cause)}`, { cause });
    this.operation = operation;
  }
}

/** The guild or channel an indexing job was asked to cover does not exist. */
export class IndexingTargetError extends KnowledgeBotError {}

export class ConfigurationError extends KnowledgeBotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Log an error together with where it happened and any extra debugging
 * information, as a single entry.
 */
export function logErrorWithContext(
  logger: Logger,
  error: unknown,
  context: string,
  additionalInfo?: Record<string, unknown>
): void {
  logger.error(`Error in ${context}: ${getErrorMessage(error)}`, {
    errorType: error instanceof Error ? error.name : typeof error,
    stack: error instanceof Error ? error.stack : undefined,
    ...additionalInfo,
  });
}
