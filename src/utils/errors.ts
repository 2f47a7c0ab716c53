import type { EventKind } from '../core/types.js';

export class StableScopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends StableScopeError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * Raised for bad caller input before any network call is made.
 */
export class ValidationError extends StableScopeError {
  constructor(message: string) {
    super(message);
  }
}

export type ProviderErrorReason =
  | 'range-too-large'
  | 'rate-limit'
  | 'timeout'
  | 'unsupported-method'
  | 'unknown';

export interface ProviderErrorContext {
  reason: ProviderErrorReason;
  fromBlock?: number;
  toBlock?: number;
  cause?: unknown;
}

/**
 * A log query or other RPC read was rejected. `fromBlock`/`toBlock` name the
 * sub-range that failed so the caller can retry with a narrower window.
 */
export class ProviderError extends StableScopeError {
  readonly reason: ProviderErrorReason;
  readonly fromBlock?: number;
  readonly toBlock?: number;

  constructor(message: string, context: ProviderErrorContext) {
    super(message, { cause: context.cause });
    this.reason = context.reason;
    this.fromBlock = context.fromBlock;
    this.toBlock = context.toBlock;
  }
}

export interface DecodeErrorContext {
  kind: EventKind;
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
}

/**
 * A single log did not match the expected event layout.
 */
export class DecodeError extends StableScopeError {
  readonly kind: EventKind;
  readonly blockNumber: number;
  readonly transactionHash: string;
  readonly logIndex: number;

  constructor(message: string, context: DecodeErrorContext) {
    super(message);
    this.kind = context.kind;
    this.blockNumber = context.blockNumber;
    this.transactionHash = context.transactionHash;
    this.logIndex = context.logIndex;
  }
}

export class FetchAbortedError extends StableScopeError {
  constructor(message: string, public readonly lastCompletedBlock: number | null) {
    super(message);
  }
}

export class FileSystemError extends StableScopeError {
  constructor(message: string) {
    super(message);
  }
}
