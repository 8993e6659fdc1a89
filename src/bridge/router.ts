/**
 * Message Router
 *
 * Turns validated host commands into registry lookups and connection
 * manager calls, and reports every outcome back as an event.
 */

import type { ConnectionManager, RejectedResult, SendResult } from './connections.js';
import type { DestinationRegistry } from './registry.js';
import { formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { PLUGIN_VERSION } from '../lib/manifest.js';
import type {
  ConnectCommand,
  Destination,
  DisconnectCommand,
  EventSink,
  HostInfoCommand,
  InboundCommand,
  SendMessageCommand,
  StatusCommand,
} from '../lib/types.js';

export interface MessageRouterOptions {
  registry: DestinationRegistry;
  connections: ConnectionManager;
  emit: EventSink;
  /** Called when the host asks the plugin to close */
  onClose?: () => void | Promise<void>;
  logger?: Logger;
}

export class MessageRouter {
  private readonly log: Logger;

  constructor(private readonly options: MessageRouterOptions) {
    this.log = options.logger ?? createLogger('router');
  }

  async handle(command: InboundCommand): Promise<void> {
    switch (command.action) {
      case 'sendmessage':
        this.sendMessage(command);
        return;
      case 'connect':
        this.connect(command);
        return;
      case 'disconnect':
        this.disconnect(command);
        return;
      case 'status':
        this.status(command);
        return;
      case 'close':
        this.log.info('Host requested plugin close');
        await this.options.onClose?.();
        return;
      case 'info':
        this.hostInfo(command);
        return;
      case 'settings':
        this.log.debug('Host settings', { settings: Object.keys(command.values) });
        return;
    }
  }

  private sendMessage(command: SendMessageCommand): void {
    const { registry, connections } = this.options;
    const destination = registry.getOrCreate(command.destination);
    const result = connections.send(destination, command.message, command.correlationId);
    this.reportSend(destination, result, command.correlationId);
  }

  private connect(command: ConnectCommand): void {
    const { registry, connections, emit } = this.options;
    const destination = registry.getOrCreate(command.destination);
    const result = connections.connect(destination);
    if (result.outcome === 'rejected') {
      this.reportRejection(destination, result, command.correlationId);
      return;
    }
    emit({
      event: 'status',
      destination: destination.id,
      detail: describe(destination),
      correlationId: command.correlationId,
    });
  }

  private disconnect(command: DisconnectCommand): void {
    const { registry, connections, emit } = this.options;
    const destination = registry.get(command.destination);
    if (!destination) {
      emit({
        event: 'error',
        destination: command.destination,
        detail: 'Unknown destination',
        correlationId: command.correlationId,
      });
      return;
    }

    // Gone from the registry first, so later commands get a fresh entry
    registry.remove(destination.id);
    const discarded = destination.pendingSends.splice(0).length;
    emit({
      event: 'removed',
      destination: destination.id,
      detail: discarded > 0 ? `discarded ${discarded} pending` : undefined,
      correlationId: command.correlationId,
    });

    // The close handshake finishes in the background and reports its own `closed` event
    connections.remove(destination).catch((error) => {
      this.log.error('Closing removed destination failed', {
        destination: destination.id,
        error: formatError(error),
      });
    });
  }

  private hostInfo(command: HostInfoCommand): void {
    this.log.info(`Connected to host v${command.hostVersion ?? '?'}`, {
      pluginVersion: command.pluginVersion,
    });
    if (command.pluginVersion === undefined || command.pluginVersion === PLUGIN_VERSION) {
      return;
    }
    const detail = `Host loaded manifest version ${command.pluginVersion}, bridge implements ${PLUGIN_VERSION}`;
    this.log.warn(detail);
    this.options.emit({ event: 'error', detail });
  }

  private status(command: StatusCommand): void {
    const { registry, emit } = this.options;
    const destinations = registry.list();
    if (destinations.length === 0) {
      emit({ event: 'status', detail: 'no destinations', correlationId: command.correlationId });
      return;
    }
    for (const destination of destinations) {
      emit({
        event: 'status',
        destination: destination.id,
        detail: describe(destination),
        correlationId: command.correlationId,
      });
    }
  }

  private reportSend(destination: Destination, result: SendResult, correlationId?: string): void {
    switch (result.outcome) {
      case 'sent':
        this.options.emit({ event: 'sent', destination: destination.id, correlationId });
        return;
      case 'queued':
        this.options.emit({
          event: 'queued',
          destination: destination.id,
          detail: `${destination.pendingSends.length} pending`,
          correlationId,
        });
        return;
      case 'rejected':
        this.reportRejection(destination, result, correlationId);
        return;
    }
  }

  /**
   * An address error is surfaced once per offending value; a correlated
   * command always gets its acknowledgment.
   */
  private reportRejection(destination: Destination, result: RejectedResult, correlationId?: string): void {
    if (result.alreadyReported && correlationId === undefined) {
      this.log.debug('Rejected again, already reported', { destination: destination.id });
      return;
    }
    this.options.emit({
      event: 'error',
      destination: destination.id,
      detail: result.error.message,
      correlationId,
    });
  }
}

function describe(destination: Destination): string {
  const pending = destination.pendingSends.length;
  return pending > 0 ? `${destination.connectionState} (${pending} pending)` : destination.connectionState;
}
