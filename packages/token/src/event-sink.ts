/**
 * @tallystake/token: In-memory event sink.
 *
 * Keeps committed events in a plain array and dispatches them
 * synchronously to subscribers. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes and the CLI walkthrough
 *
 * Not durable: all events are lost on process exit.
 */

import type { TokenEvent, TokenEventOf, TokenEventType } from "@tallystake/types";
import type { EventSink } from "./types.js";

export type EventHandler = (event: TokenEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export class InMemoryEventSink implements EventSink {
  /** Emitted events, in emission order */
  private readonly _log: TokenEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();

  emit(event: TokenEvent): void {
    this._log.push(event);
    for (const handler of this._subscribers) {
      handler(event);
    }
  }

  events(): readonly TokenEvent[] {
    return [...this._log];
  }

  ofType<K extends TokenEventType>(type: K): readonly TokenEventOf<K>[] {
    return this._log.filter((e): e is TokenEventOf<K> => e.type === type);
  }

  get count(): number {
    return this._log.length;
  }

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  clear(): void {
    this._log.length = 0;
  }
}
