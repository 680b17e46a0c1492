/**
 * Session client: connection, quit triggers and the session driver.
 */

export { MonitorConnection, DEFAULT_CONNECTION_CONFIG } from './connection.js';
export type {
  ConnectionConfig,
  ConnectionState,
  ConnectionEvent,
  ConnectionEventHandler,
} from './connection.js';

export { MonitorSession, decodeErrorEntry } from './session.js';
export type {
  MonitorSessionOptions,
  SessionState,
  SessionResult,
  TerminationReason,
} from './session.js';

export { BaseQuitSource, ManualQuitSource, KeyboardQuitSource } from './quit-source.js';
export type { QuitSource, QuitListener, KeyboardQuitOptions } from './quit-source.js';
