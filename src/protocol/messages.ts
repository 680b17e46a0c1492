/**
 * Message definitions for the management server's event stream.
 *
 * The server writes one JSON object per line:
 * `{"type": ..., "timestamp": ..., "source": ..., "data": {...}}`
 *
 * Every known `type` maps to one variant of {@link MonitorMessage}
 * with its own payload shape; anything else becomes an
 * {@link UnknownMessage}.
 */

// =============================================================================
// Envelope
// =============================================================================

/**
 * Fields shared by every decoded message.
 */
export interface EnvelopeFields {
  /** Local `HH:MM:SS` time, or the raw timestamp text if it did not parse. */
  readonly time: string;
  /** Whether the server sent a timestamp at all. */
  readonly timestampPresent: boolean;
  /** Origin label, `'unknown'` when absent. */
  readonly source: string;
}

// =============================================================================
// Payloads
// =============================================================================

export interface WelcomePayload {
  readonly server: string;
  readonly version: string;
  readonly capabilities: readonly string[];
}

export interface LogEntryPayload {
  /** Upper-cased severity level. */
  readonly level: string;
  readonly message: string;
  readonly isError: boolean;
}

export interface PerformanceMetricsPayload {
  readonly cpu: number;
  readonly memory: number;
  readonly disk: number;
  readonly gpu: number;
  readonly networkStatus: string;
  readonly webInterfaceAccessible: boolean;
  readonly apiEndpointAccessible: boolean;
}

export interface ServiceStatusPayload {
  readonly isInstalled: boolean;
  readonly isRunning: boolean;
  readonly isInstalling: boolean;
  readonly isUninstalling: boolean;
  readonly lastError: string;
  readonly installationProgress: string;
}

export interface DiscoveredNode {
  readonly name: string;
  readonly address: string;
  readonly isOnline: boolean;
}

export interface NetworkDiscoveryPayload {
  readonly isDiscovering: boolean;
  readonly discoveredNodesCount: number;
  readonly lastError: string;
  readonly nodes: readonly DiscoveredNode[];
}

export interface DebugMessagePayload {
  /** Upper-cased severity level. */
  readonly level: string;
  readonly message: string;
  /** Component name carried inside `data`, if the server sent one. */
  readonly component: string | null;
}

// =============================================================================
// Messages
// =============================================================================

export interface WelcomeMessage extends EnvelopeFields {
  readonly type: 'welcome';
  readonly payload: WelcomePayload;
}

export interface LogEntryMessage extends EnvelopeFields {
  readonly type: 'log_entry';
  readonly payload: LogEntryPayload;
}

export interface PerformanceMetricsMessage extends EnvelopeFields {
  readonly type: 'performance_metrics';
  readonly payload: PerformanceMetricsPayload;
}

export interface ServiceStatusMessage extends EnvelopeFields {
  readonly type: 'service_status';
  readonly payload: ServiceStatusPayload;
}

export interface NetworkDiscoveryMessage extends EnvelopeFields {
  readonly type: 'network_discovery';
  readonly payload: NetworkDiscoveryPayload;
}

export interface DebugMessage extends EnvelopeFields {
  readonly type: 'debug_message';
  readonly payload: DebugMessagePayload;
}

/**
 * A message whose type tag is not one of the known kinds.
 */
export interface UnknownMessage extends EnvelopeFields {
  readonly type: 'unknown';
  /** The tag exactly as the server sent it. */
  readonly rawType: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * All message kinds the client understands.
 */
export type KnownMessage =
  | WelcomeMessage
  | LogEntryMessage
  | PerformanceMetricsMessage
  | ServiceStatusMessage
  | NetworkDiscoveryMessage
  | DebugMessage;

/**
 * Any decoded message.
 */
export type MonitorMessage = KnownMessage | UnknownMessage;

export type KnownMessageType = KnownMessage['type'];

export type MessageType = MonitorMessage['type'];

/**
 * Type tags handled by a dedicated handler.
 */
export const KNOWN_MESSAGE_TYPES: readonly KnownMessageType[] = [
  'welcome',
  'log_entry',
  'performance_metrics',
  'service_status',
  'network_discovery',
  'debug_message',
] as const;

export function isKnownMessageType(value: string): value is KnownMessageType {
  return (KNOWN_MESSAGE_TYPES as readonly string[]).includes(value);
}
