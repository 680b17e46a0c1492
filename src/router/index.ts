export { MessageRouter, faultEntry } from './message-router.js';
export type { MessageRouterOptions } from './message-router.js';
export {
  DEFAULT_HANDLERS,
  RECENT_NODE_COUNT,
  classifyLogEntry,
  describeServiceStatus,
  handleWelcome,
  handleLogEntry,
  handlePerformanceMetrics,
  handleServiceStatus,
  handleNetworkDiscovery,
  handleDebugMessage,
  handleUnknown,
} from './handlers.js';
export type { HandlerContext, HandlerTable, MessageHandler } from './handlers.js';
