/**
 * Shared types for the WebSocket bridge.
 *
 * A Destination is the registry's record for one named endpoint. Its live
 * socket and retry timer are held by the connection manager, never here.
 */

export type ConnectionState = 'Disconnected' | 'Connecting' | 'Open' | 'Closing' | 'Failed';

export interface ErrorRecord {
  code: string;
  message: string;
  /** Epoch milliseconds */
  at: number;
}

export interface PendingSend {
  payload: string;
  /** Epoch milliseconds when the payload was accepted */
  enqueuedAt: number;
  correlationId?: string;
}

export interface Destination {
  /** Registry key, trimmed and case-sensitive */
  readonly id: string;
  /** Resolved ws:// or wss:// URL, set on the first connect attempt */
  target?: string;
  connectionState: ConnectionState;
  lastError?: ErrorRecord;
  pendingSends: PendingSend[];
}

export type SendOutcome = 'sent' | 'queued' | 'rejected';

export type BridgeEventName =
  | 'ready'
  | 'sent'
  | 'queued'
  | 'dropped'
  | 'error'
  | 'opened'
  | 'closed'
  | 'received'
  | 'removed'
  | 'status';

/** One outbound line on the host channel */
export interface BridgeEvent {
  event: BridgeEventName;
  destination?: string;
  detail?: string;
  correlationId?: string;
}

export type EventSink = (event: BridgeEvent) => void;

interface CommandBase {
  correlationId?: string;
}

export interface SendMessageCommand extends CommandBase {
  action: 'sendmessage';
  destination: string;
  message: string;
}

export interface ConnectCommand extends CommandBase {
  action: 'connect';
  destination: string;
}

export interface DisconnectCommand extends CommandBase {
  action: 'disconnect';
  destination: string;
}

export interface StatusCommand extends CommandBase {
  action: 'status';
}

/** Host is shutting the plugin down */
export interface ClosePluginCommand {
  action: 'close';
}

/** Host greeting, sent once after the plugin starts */
export interface HostInfoCommand {
  action: 'info';
  hostVersion?: string;
  pluginVersion?: number;
}

export interface HostSettingsCommand {
  action: 'settings';
  values: Record<string, unknown>;
}

export type InboundCommand =
  | SendMessageCommand
  | ConnectCommand
  | DisconnectCommand
  | StatusCommand
  | ClosePluginCommand
  | HostInfoCommand
  | HostSettingsCommand;
