/**
 * EventBus
 *
 * Central emission point for dashboard events. Event ids are deterministic:
 * run id + sequence number. Delivery is fire-and-forget; a failing handler is
 * logged and never reaches the emitter.
 */

import { silentLogger, type Logger } from "../logging";
import type { CorridorEvent, CorridorEventBody, EventHandler } from "./types";

export class EventBus {
  private sequence = 0;
  private handlers: EventHandler[] = [];
  private history: CorridorEvent[] = [];

  constructor(
    private readonly runId: string,
    private readonly opts: { logger?: Logger; now?: () => number; keepHistory?: boolean } = {}
  ) {}

  /**
   * Register a handler. Returns a function that removes it.
   */
  on(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(episode: string, body: CorridorEventBody): CorridorEvent {
    const sequence = this.sequence++;
    const event: CorridorEvent = {
      ...body,
      event_id: `${this.runId}-${sequence}`,
      sequence,
      run_id: this.runId,
      episode,
      timestamp_ms: (this.opts.now ?? Date.now)(),
    };

    if (this.opts.keepHistory ?? true) {
      this.history.push(event);
    }

    const logger = this.opts.logger ?? silentLogger;
    for (const handler of this.handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => logger.warn(`Event handler error for ${event.event_id}:`, err));
        }
      } catch (err) {
        logger.warn(`Event handler error for ${event.event_id}:`, err);
      }
    }

    return event;
  }

  getHistory(): readonly CorridorEvent[] {
    return [...this.history];
  }
}
