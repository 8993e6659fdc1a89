/**
 * Error taxonomy for the bridge. None of these are fatal to the process.
 */

import type { ErrorRecord } from './types.js';

/** Malformed or unparseable host command */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code:
      | 'PARSE_ERROR'
      | 'INVALID_COMMAND'
      | 'UNKNOWN_ACTION'
      | 'PLUGIN_MISMATCH'
      | 'LINE_TOO_LONG',
    public readonly correlationId?: string
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** Destination does not resolve to a ws:// or wss:// endpoint */
export class AddressError extends Error {
  public readonly code = 'INVALID_ADDRESS' as const;

  constructor(
    message: string,
    public readonly destination: string
  ) {
    super(message);
    this.name = 'AddressError';
  }
}

/** Connect, handshake or send failure against a valid endpoint */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: 'CONNECT_FAILED' | 'SEND_FAILED' | 'CONNECTION_LOST'
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class QueueOverflowError extends Error {
  public readonly code = 'QUEUE_OVERFLOW' as const;

  constructor(
    message: string,
    public readonly destination: string
  ) {
    super(message);
    this.name = 'QueueOverflowError';
  }
}

export type BridgeError = ProtocolError | AddressError | TransportError | QueueOverflowError;

export function toErrorRecord(error: BridgeError, now: number = Date.now()): ErrorRecord {
  return { code: error.code, message: error.message, at: now };
}

export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
