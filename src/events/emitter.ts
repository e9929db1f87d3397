/**
 * Fleetplan — Planning Event Emitter
 *
 * Handler list shared by the cycle manager, distributor and protocol so a
 * monitoring collaborator can subscribe once and see the whole cycle.
 */

import type { PlanningEventHandler, PlanningEventType } from '../types/index.js';
import { Logger, defaultLogger, describeError } from '../logging/logger.js';

export class PlanningEvents {
  private handlers: PlanningEventHandler[] = [];
  private readonly log: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.log = logger.child('events');
  }

  /**
   * Register a handler. Returns a function that removes it.
   */
  onEvent(handler: PlanningEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(type: PlanningEventType, data: unknown): void {
    for (const handler of this.handlers) {
      try {
        handler(type, data);
      } catch (error) {
        // A broken subscriber must not stall planning.
        this.log.warn('event handler threw', { type, error: describeError(error) });
      }
    }
  }
}
