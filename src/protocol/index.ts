/**
 * Wire protocol: framing, message types and decoding.
 */

export { FrameDecoder, FRAME_DELIMITER } from './frame-decoder.js';
export type { FrameDecoderOptions } from './frame-decoder.js';

export { parseFrame, UNKNOWN_TYPE, UNKNOWN_SOURCE } from './parser.js';
export type { ParseOptions } from './parser.js';

export { formatClock, formatTimestamp, parseIsoInstant } from './timestamp.js';

export { KNOWN_MESSAGE_TYPES, isKnownMessageType } from './messages.js';
export type {
  EnvelopeFields,
  WelcomePayload,
  LogEntryPayload,
  PerformanceMetricsPayload,
  ServiceStatusPayload,
  DiscoveredNode,
  NetworkDiscoveryPayload,
  DebugMessagePayload,
  WelcomeMessage,
  LogEntryMessage,
  PerformanceMetricsMessage,
  ServiceStatusMessage,
  NetworkDiscoveryMessage,
  DebugMessage,
  UnknownMessage,
  KnownMessage,
  KnownMessageType,
  MonitorMessage,
  MessageType,
} from './messages.js';

export {
  ConnectError,
  DecodeError,
  TransportReadError,
  HandlerFault,
  FrameTooLargeError,
  ConfigError,
  PREVIEW_LENGTH,
  toError,
} from './errors.js';
