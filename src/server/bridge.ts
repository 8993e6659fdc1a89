/**
 * WebSocket Bridge Server
 *
 * Wires the host channel, registry, connection manager and router together
 * and owns their lifecycle: created in initialize(), torn down in stop().
 */

import type { Readable, Writable } from 'stream';

import { ConnectionManager, type SocketFactory } from '../bridge/connections.js';
import { HostProtocolAdapter } from '../bridge/protocol.js';
import { DestinationRegistry } from '../bridge/registry.js';
import { MessageRouter } from '../bridge/router.js';
import {
  ConfigError,
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  loadConfig,
  type BridgeConfig,
} from '../lib/config.js';
import { formatError } from '../lib/errors.js';
import { closeLogFile, configureLogging, createLogger } from '../lib/logger.js';
import { PLUGIN_ID, PLUGIN_NAME, PLUGIN_VERSION } from '../lib/manifest.js';

const log = createLogger('bridge');

export interface BridgeServerOptions {
  configPath?: string;
  input?: Readable;
  output?: Writable;
  createSocket?: SocketFactory;
  /** Install signal and uncaught-error handlers on `process` (default: false) */
  handleProcessEvents?: boolean;
}

export class WebSocketBridgeServer {
  private config: BridgeConfig = defaultConfig();
  private configError: string | null = null;
  private readonly registry = new DestinationRegistry();
  private readonly adapter: HostProtocolAdapter;
  private connections: ConnectionManager | null = null;
  private router: MessageRouter | null = null;
  private stopping: Promise<void> | null = null;
  private markStopped: () => void = () => {};
  private readonly stopped: Promise<void>;

  constructor(private readonly options: BridgeServerOptions = {}) {
    this.adapter = new HostProtocolAdapter({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    this.stopped = new Promise<void>((resolve) => {
      this.markStopped = resolve;
    });
  }

  /**
   * Load config and build the bridge components
   */
  async initialize(): Promise<void> {
    const configPath = this.options.configPath ?? DEFAULT_CONFIG_FILE;
    try {
      this.config = await loadConfig(configPath);
    } catch (error) {
      this.configError = formatError(error);
      if (error instanceof ConfigError && error.code === 'NOT_FOUND') {
        log.info(this.configError);
      } else {
        log.error('Failed to load bridge config, using defaults', { error: this.configError });
      }
      this.config = defaultConfig();
    }
    configureLogging(this.config.logging);

    this.connections = new ConnectionManager({
      connection: this.config.connection,
      aliases: this.config.destinations,
      onEvent: (event) => this.adapter.emit(event),
      createSocket: this.options.createSocket,
      logger: log.child('connections'),
    });
    this.router = new MessageRouter({
      registry: this.registry,
      connections: this.connections,
      emit: (event) => this.adapter.emit(event),
      onClose: () => this.stop('host closed plugin'),
      logger: log.child('router'),
    });
  }

  async start(): Promise<void> {
    const router = this.router;
    if (!router) {
      throw new Error('WebSocketBridgeServer.start() called before initialize()');
    }

    this.adapter.onCommand((command) => router.handle(command));
    this.adapter.onEnd(() => {
      this.stop('host channel closed').catch((error) => {
        log.error('Stop failed', { error: formatError(error) });
      });
    });
    // Failing to open the host channels is the one fatal condition
    this.adapter.attach();

    if (this.options.handleProcessEvents) {
      this.setupProcessHandlers();
    }

    this.adapter.emit({ event: 'ready', detail: `${PLUGIN_ID} v${PLUGIN_VERSION}` });
    log.info(`Starting ${PLUGIN_NAME} v${PLUGIN_VERSION} on ${process.platform}`, {
      destinationAliases: Object.keys(this.config.destinations).length,
      configLoaded: this.configError === null,
    });
  }

  /**
   * Close every connection and release the host channel. Safe to call twice.
   */
  stop(reason = 'stop requested'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  /**
   * Resolves once stop() has finished
   */
  waitForStop(): Promise<void> {
    return this.stopped;
  }

  getRegistry(): DestinationRegistry {
    return this.registry;
  }

  getConfig(): BridgeConfig {
    return this.config;
  }

  private async shutdown(reason: string): Promise<void> {
    log.info(`Stopping: ${reason}`);
    try {
      await this.connections?.shutdown();
    } finally {
      this.adapter.detach();
      log.info(`${PLUGIN_NAME} stopped`);
      await closeLogFile();
      this.markStopped();
    }
  }

  private setupProcessHandlers(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      this.stop(`received ${signal}`).catch((error) => {
        log.error('Stop failed', { error: formatError(error) });
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    process.on('uncaughtException', (error) => {
      log.error('Uncaught Exception', { error: error.stack ?? error.message });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      log.error('Unhandled Rejection', { reason: formatError(reason) });
      process.exit(1);
    });
  }
}
