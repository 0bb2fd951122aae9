import EventEmitter from "events";
import { log } from "../logger.js";
import type { BusEvent, EventType } from "../types.js";

export type EventsPage = {
  events: BusEvent[];
  /**
   * Events after the cursor were evicted before they could be read, or the
   * cursor is ahead of the log (ids restarted) and the page starts over.
   */
  gap: boolean;
  /** Oldest id still retained (0 when empty). */
  oldestId: number;
  latestId: number;
};

export type EventListener = (e: BusEvent) => void;

const MAX_PAGE = 200;

/**
 * In-process event log. Ids start at 1 and increase by one per event; only
 * the most recent `capacity` events are retained.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly ring: Array<BusEvent | undefined>;
  private nextId = 1;
  private size = 0;

  constructor(
    private readonly capacity = 500,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("event capacity must be a positive integer");
    }
    this.ring = new Array<BusEvent | undefined>(capacity);
    this.emitter.setMaxListeners(0);
  }

  emit(type: EventType, summary: string, payload: Record<string, unknown> = {}): BusEvent {
    const evt: BusEvent = {
      id: this.nextId++,
      type,
      timestamp: this.now(),
      summary,
      payload,
    };
    this.ring[(evt.id - 1) % this.capacity] = evt;
    this.size = Math.min(this.size + 1, this.capacity);
    this.emitter.emit("event", evt);
    return evt;
  }

  /** Live push. Returns the unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    const safe = (e: BusEvent) => {
      try {
        listener(e);
      } catch (err) {
        log.warn("[EVENTS] subscriber error", err);
      }
    };
    this.emitter.on("event", safe);
    return () => {
      this.emitter.off("event", safe);
    };
  }

  get latestId(): number {
    return this.nextId - 1;
  }

  get oldestId(): number {
    return this.size === 0 ? 0 : this.nextId - this.size;
  }

  /**
   * Pull events with id > cursor, ascending, at most `limit` (1..200).
   * Without a cursor the most recent `limit` events are returned. A cursor
   * past `latestId` reads from the oldest retained event.
   */
  since(cursor: number | undefined, limit = 50): EventsPage {
    const n = Math.max(1, Math.min(MAX_PAGE, Math.floor(limit)));
    const oldest = this.oldestId;
    const latest = this.latestId;
    if (this.size === 0) {
      return { events: [], gap: cursor !== undefined && cursor !== latest, oldestId: 0, latestId: latest };
    }

    let from: number;
    let gap = false;
    if (cursor === undefined) {
      from = Math.max(oldest, latest - n + 1);
    } else if (cursor > latest) {
      from = oldest;
      gap = true;
    } else {
      from = Math.max(cursor + 1, oldest);
      gap = cursor + 1 < oldest;
    }

    const events: BusEvent[] = [];
    for (let id = from; id <= latest && events.length < n; id++) {
      const e = this.ring[(id - 1) % this.capacity];
      if (e && e.id === id) events.push(e);
    }
    return { events, gap, oldestId: oldest, latestId: latest };
  }
}
