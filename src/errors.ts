/**
 * Error taxonomy of the pipeline. None of these may end a session on their
 * own: the feed and the session catch them per trade and carry on.
 */
export class SandwichBotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SandwichBotError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network or RPC failure. Forces the feed into fallback or aborts a leg. */
export class TransportError extends SandwichBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

/** The log subscription was refused or never acknowledged. */
export class SubscriptionError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubscriptionError';
  }
}

/** A single observed message could not be decoded. Skip it. */
export class DecodeError extends SandwichBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}

/** Bad sizing or reserve values. Rejects one opportunity. */
export class InvalidInputError extends SandwichBotError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export type BuildErrorReason =
  | 'Unprofitable'
  | 'MissingPoolKeys'
  | 'MissingReserves'
  | 'InsufficientOutput';

export class BuildError extends SandwichBotError {
  constructor(
    public readonly reason: BuildErrorReason,
    message: string,
  ) {
    super(message, `BUILD_${reason.toUpperCase()}`);
    this.name = 'BuildError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
