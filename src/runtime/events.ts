import type { ProtocolEvent } from "../engine/types.js";
import type { Checkpointable } from "./ledger.js";

export interface LoggedEvent {
  timestamp: bigint;
  event: ProtocolEvent;
}

export type EventListener = (entry: LoggedEvent) => void;

/**
 * Append-only log of protocol events. Rolling back a call truncates the log;
 * listeners have already seen the dropped events and are not told.
 */
export class EventLog implements Checkpointable<number> {
  private readonly entries: LoggedEvent[] = [];
  private readonly listeners = new Set<EventListener>();

  emit(timestamp: bigint, event: ProtocolEvent): void {
    const entry = { timestamp, event };
    this.entries.push(entry);
    for (const listener of this.listeners) listener(entry);
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  all(): readonly LoggedEvent[] {
    return this.entries;
  }

  ofType<K extends ProtocolEvent["type"]>(type: K): Extract<ProtocolEvent, { type: K }>[] {
    const out: Extract<ProtocolEvent, { type: K }>[] = [];
    for (const { event } of this.entries) {
      if (isEventOfType(event, type)) out.push(event);
    }
    return out;
  }

  checkpoint(): number {
    return this.entries.length;
  }

  restore(length: number): void {
    this.entries.length = length;
  }
}

function isEventOfType<K extends ProtocolEvent["type"]>(
  event: ProtocolEvent,
  type: K,
): event is Extract<ProtocolEvent, { type: K }> {
  return event.type === type;
}

/**
 * JSON.stringify replacer for bigint fields.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
