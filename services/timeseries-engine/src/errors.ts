import type { ChunkState } from './types/domain.js';

/**
 * Base class for every failure the engine surfaces to callers. `code` is
 * stable and `status` is the HTTP status the API answers with.
 */
export class EngineError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateKeyError extends EngineError {
  constructor(readonly table: string, readonly key: string) {
    super(`duplicate key ${key} in ${table}`, 'DUPLICATE_KEY', 409);
  }
}

export class ChunkImmutableError extends EngineError {
  constructor(readonly chunkId: string, readonly state: ChunkState) {
    super(`chunk ${chunkId} is ${state} and no longer accepts writes`, 'CHUNK_IMMUTABLE', 409);
  }
}

export class InvalidArgumentError extends EngineError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT', 400);
  }
}

export class RefreshSkippedError extends EngineError {
  constructor(readonly aggregate: string) {
    super(`refresh of ${aggregate} still running`, 'REFRESH_SKIPPED', 409);
  }
}
