import { formatFrame } from './protocol.js';

export type ConnectionErrorKind = 'unreachable' | 'timeout' | 'reset' | 'closed';

/** Socket-level failure. Always handled by reconnecting with backoff. */
export class ConnectionError extends Error {
  constructor(
    readonly kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** The device sent bytes that do not decode to a valid frame. */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly raw: Buffer = Buffer.alloc(0),
    options?: { cause?: unknown },
  ) {
    super(raw.length > 0 ? `${message} [${formatFrame(raw)}]` : message, options);
    this.name = 'ProtocolError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
