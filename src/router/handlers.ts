/**
 * Per-type message handlers.
 *
 * Each handler turns one message into a feed entry and, for log and
 * metrics messages, updates the aggregate store.
 */

import type {
  DebugMessage,
  LogEntryMessage,
  MonitorMessage,
  NetworkDiscoveryMessage,
  PerformanceMetricsMessage,
  ServiceStatusMessage,
  UnknownMessage,
  WelcomeMessage,
} from '../protocol/messages.js';
import type { AggregateStore, Severity } from '../state/aggregate-store.js';
import type { FeedEntry } from '../feed/types.js';
import { Glyphs, INDENT, formatPercent, rule, statusGlyph } from '../feed/formatters.js';

/**
 * Number of most recent nodes listed for a discovery message.
 */
export const RECENT_NODE_COUNT = 3;

/**
 * State available to handlers.
 */
export interface HandlerContext {
  readonly store: AggregateStore;
  /** Clock for sample capture times (ms). */
  readonly now: () => number;
}

export type MessageHandler<M extends MonitorMessage> = (
  message: M,
  context: HandlerContext,
) => FeedEntry;

/**
 * One handler per message type.
 */
export type HandlerTable = {
  readonly [K in MonitorMessage['type']]: MessageHandler<Extract<MonitorMessage, { type: K }>>;
};

// =============================================================================
// Handlers
// =============================================================================

export function handleWelcome(message: WelcomeMessage): FeedEntry {
  const { server, version, capabilities } = message.payload;
  return {
    kind: 'welcome',
    severity: 'success',
    lines: [
      `${Glyphs.WELCOME} [${message.time}] Connected to ${server} v${version}`,
      `${INDENT}${Glyphs.CAPABILITIES} Capabilities: ${capabilities.join(', ')}`,
      rule('-'),
    ],
  };
}

/**
 * Classifies a log entry. The error flag wins over the level.
 */
export function classifyLogEntry(isError: boolean, level: string): Severity {
  if (isError || level === 'ERROR') return 'error';
  if (level === 'WARNING') return 'warning';
  return 'info';
}

export function handleLogEntry(message: LogEntryMessage, context: HandlerContext): FeedEntry {
  const { level, message: text, isError } = message.payload;
  const severity = classifyLogEntry(isError, level);
  context.store.recordSeverity(severity);

  return {
    kind: 'log_entry',
    severity,
    lines: [`${severityGlyph(severity, Glyphs.INFO)} [${message.time}] [${level}] ${text}`],
  };
}

export function handlePerformanceMetrics(
  message: PerformanceMetricsMessage,
  context: HandlerContext,
): FeedEntry {
  const { cpu, memory, disk, gpu } = message.payload;
  context.store.recordPerformance({ capturedAt: context.now(), cpu, memory, disk, gpu });

  const { networkStatus, webInterfaceAccessible, apiEndpointAccessible } = message.payload;
  return {
    kind: 'performance_metrics',
    severity: 'info',
    lines: [
      `${Glyphs.METRICS} [${message.time}] CPU: ${formatPercent(cpu)} | Memory: ${formatPercent(memory)} | ` +
        `Disk: ${formatPercent(disk)} | GPU: ${formatPercent(gpu)}`,
      `${INDENT}${Glyphs.NETWORK} Network: ${networkStatus} | Web: ${statusGlyph(webInterfaceAccessible)} | ` +
        `API: ${statusGlyph(apiEndpointAccessible)}`,
    ],
  };
}

/**
 * Picks the service status text: installing, then uninstalling,
 * then installed (running or stopped), then not installed.
 */
export function describeServiceStatus(payload: ServiceStatusMessage['payload']): string {
  if (payload.isInstalling) {
    const progress = payload.installationProgress;
    return `${Glyphs.BUSY} Installing${progress ? ` - ${progress}` : ''}`;
  }
  if (payload.isUninstalling) {
    return `${Glyphs.BUSY} Uninstalling`;
  }
  if (payload.isInstalled) {
    return payload.isRunning ? `${Glyphs.ONLINE} Running` : `${Glyphs.OFFLINE} Stopped`;
  }
  return `${Glyphs.NOT_INSTALLED} Not Installed`;
}

export function handleServiceStatus(message: ServiceStatusMessage): FeedEntry {
  const lines = [`${Glyphs.SERVICE} [${message.time}] Service: ${describeServiceStatus(message.payload)}`];
  appendError(lines, message.payload.lastError);

  return {
    kind: 'service_status',
    severity: message.payload.lastError ? 'error' : 'info',
    lines,
  };
}

export function handleNetworkDiscovery(message: NetworkDiscoveryMessage): FeedEntry {
  const { isDiscovering, discoveredNodesCount, lastError, nodes } = message.payload;
  const status = isDiscovering ? `${Glyphs.SCANNING} Scanning` : `${Glyphs.IDLE} Idle`;

  const lines = [
    `${Glyphs.NETWORK} [${message.time}] Network Discovery: ${status} | Nodes: ${discoveredNodesCount}`,
  ];
  appendError(lines, lastError);

  for (const node of nodes.slice(-RECENT_NODE_COUNT)) {
    lines.push(`${INDENT}${statusGlyph(node.isOnline)} ${node.name} (${node.address})`);
  }

  return {
    kind: 'network_discovery',
    severity: lastError ? 'error' : 'info',
    lines,
  };
}

export function handleDebugMessage(message: DebugMessage): FeedEntry {
  const { level, message: text, component } = message.payload;
  const severity: Severity = level === 'ERROR' ? 'error' : level === 'WARNING' ? 'warning' : 'info';
  const source = message.source === 'unknown' && component !== null ? component : message.source;

  return {
    kind: 'debug_message',
    severity,
    lines: [`${severityGlyph(severity, Glyphs.DEBUG)} [${message.time}] [${source}] ${text}`],
  };
}

export function handleUnknown(message: UnknownMessage): FeedEntry {
  return {
    kind: 'unknown',
    severity: 'warning',
    lines: [`${Glyphs.UNKNOWN} [${message.time}] Unknown message type: ${message.rawType}`],
  };
}

/**
 * Default handler for every message type.
 */
export const DEFAULT_HANDLERS: HandlerTable = {
  welcome: handleWelcome,
  log_entry: handleLogEntry,
  performance_metrics: handlePerformanceMetrics,
  service_status: handleServiceStatus,
  network_discovery: handleNetworkDiscovery,
  debug_message: handleDebugMessage,
  unknown: handleUnknown,
};

// =============================================================================
// Helpers
// =============================================================================

function appendError(lines: string[], lastError: string): void {
  if (lastError) {
    lines.push(`${INDENT}${Glyphs.ERROR} Error: ${lastError}`);
  }
}

function severityGlyph(severity: Severity, infoGlyph: string): string {
  switch (severity) {
    case 'error':
      return Glyphs.ERROR;
    case 'warning':
      return Glyphs.WARNING;
    case 'info':
      return infoGlyph;
  }
}
