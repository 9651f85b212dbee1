/**
 * In-memory append-only event log
 *
 * Stores every appended event and re-emits it to subscribers. A failing
 * subscriber is logged and does not affect the log or the other subscribers.
 */

import { EventEmitter } from "eventemitter3";
import { custodyLogger as logger, logError } from "@mintvault/shared";
import type {
  CollectionEvent,
  CollectionEventOf,
  CollectionEventType,
  EventSink,
} from "./types.js";

const eventLogger = logger.child({ component: "event-log" });

export interface EventLogEvents {
  event: (event: CollectionEvent) => void;
}

export class EventLog extends EventEmitter<EventLogEvents> implements EventSink {
  private readonly events: CollectionEvent[] = [];

  append(event: CollectionEvent): void {
    this.events.push(Object.freeze({ ...event }));

    eventLogger.debug({
      type: event.type,
      collectionId: event.collectionId,
      sequence: this.events.length,
    }, "Event appended");

    for (const listener of this.listeners("event")) {
      try {
        listener(event);
      } catch (error) {
        logError(
          error instanceof Error ? error : new Error(String(error)),
          { component: "event-log", type: event.type },
          "Event subscriber failed"
        );
      }
    }
  }

  /**
   * All events in append order
   */
  list(): readonly CollectionEvent[] {
    return [...this.events];
  }

  ofType<T extends CollectionEventType>(type: T): CollectionEventOf<T>[] {
    return this.events.filter(
      (event): event is CollectionEventOf<T> => event.type === type
    );
  }

  get size(): number {
    return this.events.length;
  }
}
