/**
 * Host Protocol Adapter
 *
 * Line-delimited JSON in both directions: one command per line on the input
 * channel, one event per line on the output channel. A line is dispatched only
 * once its terminating newline has arrived.
 *
 * Two framings are accepted and normalized into the closed `InboundCommand`
 * union: the bridge's own `{"action": ...}` commands, and the host's native
 * `{"type": ...}` messages addressed by manifest ids.
 */

import type { Readable, Writable } from 'stream';
import { z } from 'zod';

import { ProtocolError, formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import {
  DESTINATION_DATA_ID,
  MESSAGE_DATA_ID,
  PLUGIN_ID,
  SEND_MESSAGE_ACTION_ID,
  UNSET_VALUE,
} from '../lib/manifest.js';
import type { BridgeEvent, InboundCommand } from '../lib/types.js';

const text = () => z.string({ required_error: 'is required', invalid_type_error: 'must be a string' });

const correlationId = text().optional();

const BridgeCommandSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('sendmessage'),
    destination: text(),
    message: text(),
    correlationId,
  }),
  z.object({ action: z.literal('connect'), destination: text(), correlationId }),
  z.object({ action: z.literal('disconnect'), destination: text(), correlationId }),
  z.object({ action: z.literal('status'), correlationId }),
]);

const HostMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('action'),
    pluginId: text(),
    actionId: text(),
    data: z.array(z.object({ id: text(), value: text() })),
  }),
  z.object({ type: z.literal('closePlugin'), pluginId: text() }),
  z.object({
    type: z.literal('info'),
    pluginId: text().optional(),
    tpVersionString: z.string().optional(),
    pluginVersion: z.number().optional(),
  }),
  z.object({
    type: z.literal('settings'),
    pluginId: text().optional(),
    values: z.array(z.record(z.string(), z.unknown())),
  }),
]);

const BRIDGE_ACTIONS = new Set(['sendmessage', 'connect', 'disconnect', 'status']);
const HOST_TYPES = new Set(['action', 'closePlugin', 'info', 'settings']);

/**
 * Parse and validate one host line into a command.
 * Throws ProtocolError for anything that is not a well-formed known command.
 */
export function parseCommand(line: string): InboundCommand {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ProtocolError(`Invalid JSON: ${formatError(error)}`, 'PARSE_ERROR');
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ProtocolError('Command must be a JSON object', 'INVALID_COMMAND');
  }
  const fields: Record<string, unknown> = { ...raw };
  const corrId = typeof fields.correlationId === 'string' ? fields.correlationId : undefined;

  if ('action' in fields) {
    if (typeof fields.action !== 'string' || !BRIDGE_ACTIONS.has(fields.action)) {
      throw new ProtocolError(`Unknown action: ${String(fields.action)}`, 'UNKNOWN_ACTION', corrId);
    }
    return parseBridgeCommand(fields, corrId);
  }
  if ('type' in fields) {
    if (typeof fields.type !== 'string' || !HOST_TYPES.has(fields.type)) {
      throw new ProtocolError(`Unknown message type: ${String(fields.type)}`, 'UNKNOWN_ACTION');
    }
    return parseHostMessage(fields);
  }
  throw new ProtocolError('Command has neither "action" nor "type"', 'INVALID_COMMAND', corrId);
}

function parseBridgeCommand(fields: Record<string, unknown>, corrId: string | undefined): InboundCommand {
  const result = BridgeCommandSchema.safeParse(fields);
  if (!result.success) {
    throw new ProtocolError(
      `Invalid ${String(fields.action)} command: ${formatIssues(result.error)}`,
      'INVALID_COMMAND',
      corrId
    );
  }

  const command = result.data;
  switch (command.action) {
    case 'sendmessage':
      return {
        action: 'sendmessage',
        destination: normalizeDestination(command.destination, corrId),
        message: normalizeMessage(command.message, corrId),
        correlationId: command.correlationId,
      };
    case 'connect':
    case 'disconnect':
      return {
        action: command.action,
        destination: normalizeDestination(command.destination, corrId),
        correlationId: command.correlationId,
      };
    case 'status':
      return { action: 'status', correlationId: command.correlationId };
  }
}

function parseHostMessage(fields: Record<string, unknown>): InboundCommand {
  const result = HostMessageSchema.safeParse(fields);
  if (!result.success) {
    throw new ProtocolError(
      `Invalid ${String(fields.type)} message: ${formatIssues(result.error)}`,
      'INVALID_COMMAND'
    );
  }

  const message = result.data;
  if (message.pluginId !== undefined && message.pluginId !== PLUGIN_ID) {
    throw new ProtocolError(`Message addressed to plugin ${message.pluginId}`, 'PLUGIN_MISMATCH');
  }

  switch (message.type) {
    case 'action': {
      if (message.actionId !== SEND_MESSAGE_ACTION_ID) {
        throw new ProtocolError(`Unknown action id: ${message.actionId}`, 'UNKNOWN_ACTION');
      }
      const value = (id: string) => message.data.find((d) => d.id === id)?.value;
      const destination = value(DESTINATION_DATA_ID);
      const body = value(MESSAGE_DATA_ID);
      if (destination === undefined) {
        throw new ProtocolError('destination is required', 'INVALID_COMMAND');
      }
      if (body === undefined) {
        throw new ProtocolError('message is required', 'INVALID_COMMAND');
      }
      return {
        action: 'sendmessage',
        destination: normalizeDestination(destination),
        message: normalizeMessage(body),
      };
    }
    case 'closePlugin':
      return { action: 'close' };
    case 'info':
      return { action: 'info', hostVersion: message.tpVersionString, pluginVersion: message.pluginVersion };
    case 'settings':
      // [{ "Name": value }, ...] -> { Name: value, ... }
      return {
        action: 'settings',
        values: Object.fromEntries(message.values.flatMap((entry) => Object.entries(entry))),
      };
  }
}

function normalizeDestination(value: string, corrId?: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ProtocolError('destination is empty', 'INVALID_COMMAND', corrId);
  }
  if (trimmed === UNSET_VALUE) {
    throw new ProtocolError('destination is not set', 'INVALID_COMMAND', corrId);
  }
  return trimmed;
}

function normalizeMessage(value: string, corrId?: string): string {
  if (value === UNSET_VALUE) {
    throw new ProtocolError('message is not set', 'INVALID_COMMAND', corrId);
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')} ${i.message}` : i.message))
    .join(', ');
}

/**
 * Serialize an event as one newline-terminated JSON line with a fixed key order
 */
export function serializeEvent(event: BridgeEvent): string {
  const line: BridgeEvent = { event: event.event };
  if (event.destination !== undefined) line.destination = event.destination;
  if (event.detail !== undefined) line.detail = event.detail;
  if (event.correlationId !== undefined) line.correlationId = event.correlationId;
  return `${JSON.stringify(line)}\n`;
}

export type CommandHandler = (command: InboundCommand) => void | Promise<void>;

/** Longest accepted command line, in characters */
export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

export interface HostProtocolAdapterOptions {
  input: Readable;
  output: Writable;
  logger?: Logger;
  maxLineLength?: number;
}

/**
 * Reads commands from the host and writes events back.
 *
 * Usage:
 *   const adapter = new HostProtocolAdapter({ input: process.stdin, output: process.stdout });
 *   adapter.onCommand((command) => router.handle(command));
 *   adapter.attach();
 */
export class HostProtocolAdapter {
  private buffer = '';
  private handlers = new Set<CommandHandler>();
  private endHandlers = new Set<() => void>();
  private pending: Promise<void> = Promise.resolve();
  private attached = false;
  /** Dropping the rest of an oversized line up to its newline */
  private discarding = false;
  private readonly maxLineLength: number;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly log: Logger;

  private readonly onData = (chunk: string | Buffer): void => {
    this.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  };

  private readonly onInputEnd = (): void => {
    if (this.buffer.trim().length > 0) {
      this.log.warn('Host channel closed with an unterminated line, discarding it');
    }
    this.buffer = '';
    this.discarding = false;
    for (const handler of this.endHandlers) handler();
  };

  private readonly onInputError = (error: Error): void => {
    this.log.error('Host input channel error', { error: error.message });
    this.onInputEnd();
  };

  private readonly onOutputError = (error: Error): void => {
    this.log.error('Host output channel error', { error: error.message });
  };

  constructor(options: HostProtocolAdapterOptions) {
    this.input = options.input;
    this.output = options.output;
    this.log = options.logger ?? createLogger('protocol');
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  /**
   * Register a handler for validated commands
   */
  onCommand(handler: CommandHandler): void {
    this.handlers.add(handler);
  }

  offCommand(handler: CommandHandler): void {
    this.handlers.delete(handler);
  }

  /**
   * Register a handler for the host closing its side of the channel
   */
  onEnd(handler: () => void): void {
    this.endHandlers.add(handler);
  }

  attach(): void {
    if (this.attached) return;
    if (!this.input.readable) {
      throw new Error('Host input channel is not readable');
    }
    if (!this.output.writable) {
      throw new Error('Host output channel is not writable');
    }
    this.attached = true;
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.on('end', this.onInputEnd);
    this.input.on('error', this.onInputError);
    this.output.on('error', this.onOutputError);
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.input.off('data', this.onData);
    this.input.off('end', this.onInputEnd);
    this.input.off('error', this.onInputError);
    this.output.off('error', this.onOutputError);
    this.input.pause();
  }

  /**
   * Feed raw channel text. Complete lines are queued for dispatch in order;
   * a trailing partial line is held until its newline arrives. A line longer
   * than maxLineLength is answered with one error and skipped.
   */
  push(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      if (this.discarding) {
        this.discarding = false;
      } else if (line.length > this.maxLineLength) {
        this.rejectOversizedLine();
      } else if (line.trim().length > 0) {
        this.pending = this.pending.then(() => this.dispatchLine(line));
      }
      newline = this.buffer.indexOf('\n');
    }

    if (this.discarding) {
      this.buffer = '';
    } else if (this.buffer.length > this.maxLineLength) {
      this.buffer = '';
      this.discarding = true;
      this.rejectOversizedLine();
    }
  }

  /**
   * Resolves once every line received so far has been handled
   */
  idle(): Promise<void> {
    return this.pending;
  }

  emit(event: BridgeEvent): void {
    if (this.output.writableEnded || this.output.destroyed) {
      this.log.debug('Host output closed, event not delivered', { event: event.event });
      return;
    }
    if (!this.output.write(serializeEvent(event))) {
      this.log.debug('Host output buffer full, waiting for the host to read', { event: event.event });
    }
  }

  private rejectOversizedLine(): void {
    const error = new ProtocolError(`Line exceeds ${this.maxLineLength} characters`, 'LINE_TOO_LONG');
    this.pending = this.pending.then(() => this.reportRejected(error));
  }

  private reportRejected(error: ProtocolError): void {
    this.log.warn('Rejected host command', { code: error.code, error: error.message });
    this.emit({ event: 'error', detail: error.message, correlationId: error.correlationId });
  }

  private async dispatchLine(line: string): Promise<void> {
    let command: InboundCommand;
    try {
      command = parseCommand(line);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.reportRejected(error);
      } else {
        this.log.error('Unexpected failure parsing host command', { error: formatError(error) });
        this.emit({ event: 'error', detail: `Internal error: ${formatError(error)}` });
      }
      return;
    }

    this.log.debug('Host command', { action: command.action });
    for (const handler of this.handlers) {
      try {
        await handler(command);
      } catch (error) {
        this.log.error('Command handler failed', { action: command.action, error: formatError(error) });
        this.emit({
          event: 'error',
          detail: `Failed to handle ${command.action}: ${formatError(error)}`,
          correlationId: 'correlationId' in command ? command.correlationId : undefined,
        });
      }
    }
  }
}
