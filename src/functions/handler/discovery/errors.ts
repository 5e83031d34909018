/**
 * Errors raised by Auto Scaling group discovery.
 */

export type DiscoveryStage = 'tag-index query' | 'batch describe';

/**
 * Base exception for discovery failures.
 */
export class DiscoveryError extends Error {
  readonly stage: DiscoveryStage;

  constructor(stage: DiscoveryStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DiscoveryError';
    this.stage = stage;
  }
}

/**
 * Raised when a page of the tag index could not be fetched.
 */
export class TagIndexQueryError extends DiscoveryError {
  constructor(cause: unknown) {
    super('tag-index query', `Error listing autoscaling group tags: ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'TagIndexQueryError';
  }
}

/**
 * Raised when a page of a describe batch could not be fetched.
 */
export class BatchDescribeError extends DiscoveryError {
  readonly batchIndex: number;

  constructor(batchIndex: number, cause: unknown) {
    super(
      'batch describe',
      `Error describing autoscaling groups (batch ${batchIndex}): ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'BatchDescribeError';
    this.batchIndex = batchIndex;
  }
}

/**
 * Raised when the caller's abort signal fires during discovery.
 */
export class DiscoveryCancelledError extends DiscoveryError {
  constructor(stage: DiscoveryStage, cause?: unknown) {
    super(stage, `Discovery cancelled during ${stage}`, { cause });
    this.name = 'DiscoveryCancelledError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
