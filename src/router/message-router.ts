/**
 * Dispatches decoded messages to their type handler.
 */

import type { MonitorMessage } from '../protocol/messages.js';
import { HandlerFault, toError } from '../protocol/errors.js';
import type { AggregateStore } from '../state/aggregate-store.js';
import type { FeedEntry } from '../feed/types.js';
import { Glyphs } from '../feed/formatters.js';
import { DEFAULT_HANDLERS, type HandlerContext, type HandlerTable } from './handlers.js';

/**
 * Router options.
 */
export interface MessageRouterOptions {
  /** Store updated by the handlers. */
  readonly store: AggregateStore;
  /** Replacements for individual handlers. */
  readonly handlers?: Partial<HandlerTable>;
  /** Clock for sample capture times. @default Date.now */
  readonly now?: () => number;
  /** Called with every handler failure after it is turned into a feed entry. */
  readonly onFault?: (fault: HandlerFault) => void;
}

/**
 * Routes each message to exactly one handler.
 *
 * A handler that throws never takes the router down: the failure is
 * returned as an error entry for that message only.
 *
 * @example
 * ```typescript
 * const router = new MessageRouter({ store: new AggregateStore() });
 * renderer.render(router.dispatch(parseFrame(frame)));
 * ```
 */
export class MessageRouter {
  private readonly handlers: HandlerTable;
  private readonly context: HandlerContext;
  private readonly onFault: ((fault: HandlerFault) => void) | undefined;

  constructor(options: MessageRouterOptions) {
    this.handlers = { ...DEFAULT_HANDLERS, ...options.handlers };
    this.context = { store: options.store, now: options.now ?? Date.now };
    this.onFault = options.onFault;
  }

  /**
   * Counts the message and runs its handler.
   */
  dispatch(message: MonitorMessage): FeedEntry {
    this.context.store.recordMessage();

    try {
      return this.invoke(message);
    } catch (error) {
      const fault = new HandlerFault(
        message.type === 'unknown' ? message.rawType : message.type,
        toError(error),
      );
      this.onFault?.(fault);
      return faultEntry(fault);
    }
  }

  private invoke(message: MonitorMessage): FeedEntry {
    const ctx = this.context;
    switch (message.type) {
      case 'welcome':
        return this.handlers.welcome(message, ctx);
      case 'log_entry':
        return this.handlers.log_entry(message, ctx);
      case 'performance_metrics':
        return this.handlers.performance_metrics(message, ctx);
      case 'service_status':
        return this.handlers.service_status(message, ctx);
      case 'network_discovery':
        return this.handlers.network_discovery(message, ctx);
      case 'debug_message':
        return this.handlers.debug_message(message, ctx);
      case 'unknown':
        return this.handlers.unknown(message, ctx);
    }
  }
}

/**
 * Feed entry reporting a failed handler.
 */
export function faultEntry(fault: HandlerFault): FeedEntry {
  return {
    kind: 'diagnostic',
    severity: 'error',
    lines: [`${Glyphs.ERROR} Error processing message: ${fault.message}`],
  };
}
