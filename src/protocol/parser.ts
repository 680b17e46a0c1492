/**
 * Decodes text frames into typed {@link MonitorMessage} values.
 */

import { DecodeError, toError } from './errors.js';
import {
  isKnownMessageType,
  type DiscoveredNode,
  type EnvelopeFields,
  type KnownMessageType,
  type MonitorMessage,
} from './messages.js';
import {
  isRecord,
  readBoolean,
  readNumber,
  readRecordList,
  readString,
  readStringList,
  type PayloadRecord,
} from './payload.js';
import { formatTimestamp } from './timestamp.js';

/**
 * Type tag used when a frame carries none.
 */
export const UNKNOWN_TYPE = 'unknown';

/**
 * Source label used when a frame carries none.
 */
export const UNKNOWN_SOURCE = 'unknown';

/**
 * Options for {@link parseFrame}.
 */
export interface ParseOptions {
  /** Clock used when a frame has no timestamp. */
  readonly now?: () => Date;
}

/**
 * Decodes one frame.
 *
 * @throws DecodeError if the frame is not a JSON object or an envelope
 * field has the wrong type
 */
export function parseFrame(frame: string, options: ParseOptions = {}): MonitorMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(frame);
  } catch (error) {
    throw new DecodeError(`Failed to parse JSON message: ${toError(error).message}`, frame, toError(error));
  }

  if (!isRecord(decoded)) {
    throw new DecodeError('Message is not a JSON object', frame);
  }

  const type = optionalString(decoded, 'type', frame) ?? UNKNOWN_TYPE;
  const timestamp = optionalString(decoded, 'timestamp', frame);
  const source = optionalString(decoded, 'source', frame) ?? UNKNOWN_SOURCE;
  const data = optionalRecord(decoded, 'data', frame) ?? {};

  const envelope: EnvelopeFields = {
    time: formatTimestamp(timestamp, options.now),
    timestampPresent: timestamp !== undefined && timestamp !== '',
    source,
  };

  if (!isKnownMessageType(type)) {
    return { ...envelope, type: 'unknown', rawType: type, payload: data };
  }

  return buildMessage(type, envelope, data);
}

function buildMessage(
  type: KnownMessageType,
  envelope: EnvelopeFields,
  data: PayloadRecord,
): MonitorMessage {
  switch (type) {
    case 'welcome':
      return {
        ...envelope,
        type,
        payload: {
          server: readString(data, 'server', 'Unknown'),
          version: readString(data, 'version', 'Unknown'),
          capabilities: readStringList(data, 'capabilities'),
        },
      };

    case 'log_entry':
      return {
        ...envelope,
        type,
        payload: {
          level: readString(data, 'level', 'UNKNOWN').toUpperCase(),
          message: readString(data, 'message', ''),
          isError: readBoolean(data, 'isError', false),
        },
      };

    case 'performance_metrics':
      return {
        ...envelope,
        type,
        payload: {
          cpu: readNumber(data, 'cpu', 0),
          memory: readNumber(data, 'memory', 0),
          disk: readNumber(data, 'disk', 0),
          gpu: readNumber(data, 'gpu', 0),
          networkStatus: readString(data, 'network_status', 'Unknown'),
          webInterfaceAccessible: readBoolean(data, 'web_interface_accessible', false),
          apiEndpointAccessible: readBoolean(data, 'api_endpoint_accessible', false),
        },
      };

    case 'service_status':
      return {
        ...envelope,
        type,
        payload: {
          isInstalled: readBoolean(data, 'is_installed', false),
          isRunning: readBoolean(data, 'is_running', false),
          isInstalling: readBoolean(data, 'is_installing', false),
          isUninstalling: readBoolean(data, 'is_uninstalling', false),
          lastError: readString(data, 'last_error', ''),
          installationProgress: readString(data, 'installation_progress', ''),
        },
      };

    case 'network_discovery':
      return {
        ...envelope,
        type,
        payload: {
          isDiscovering: readBoolean(data, 'is_discovering', false),
          discoveredNodesCount: readNumber(data, 'discovered_nodes_count', 0),
          lastError: readString(data, 'last_error', ''),
          nodes: readRecordList(data, 'nodes').map(toDiscoveredNode),
        },
      };

    case 'debug_message': {
      const component = readString(data, 'source', '');
      return {
        ...envelope,
        type,
        payload: {
          level: readString(data, 'level', 'DEBUG').toUpperCase(),
          message: readString(data, 'message', ''),
          component: component === '' ? null : component,
        },
      };
    }
  }
}

function toDiscoveredNode(node: PayloadRecord): DiscoveredNode {
  return {
    name: readString(node, 'name', 'Unknown'),
    address: readString(node, 'address', 'Unknown'),
    isOnline: readBoolean(node, 'is_online', false),
  };
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  frame: string,
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new DecodeError(`Field '${key}' must be a string`, frame);
  }
  return value;
}

function optionalRecord(
  record: Record<string, unknown>,
  key: string,
  frame: string,
): PayloadRecord | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new DecodeError(`Field '${key}' must be an object`, frame);
  }
  return value;
}
