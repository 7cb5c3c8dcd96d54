import type { LeaderboardResult } from "./remoteStatClient";
import type { ServiceError } from "./result";

export type StatEventType =
  | "local_user_added"
  | "local_user_removed"
  | "stat_update_complete"
  | "get_leaderboard_complete"
  | "presence_heartbeat_complete";

export type StatEventProducer = "stats" | "presence";

export type StatEvent = Readonly<{
  sequence: number;
  type: StatEventType;
  producer: StatEventProducer;
  userId: string;
  error: ServiceError | null;
  leaderboard?: LeaderboardResult;
  nextIntervalMinutes?: number;
}>;

export type StatEventInput = Omit<StatEvent, "sequence">;

/**
 * Unbounded append-only buffer with a single draining consumer. Sequence
 * numbers are assigned at push time, so a drain is always in production order.
 */
export type EventQueue = Readonly<{
  push(event: StatEventInput): StatEvent;
  drain(): ReadonlyArray<StatEvent>;
  size(): number;
}>;

export function createEventQueue(): EventQueue {
  let pending: StatEvent[] = [];
  let nextSequence = 1;

  return {
    push(input: StatEventInput): StatEvent {
      const event: StatEvent = Object.freeze({ ...input, sequence: nextSequence });
      nextSequence += 1;
      pending.push(event);
      return event;
    },

    drain(): ReadonlyArray<StatEvent> {
      const drained = pending;
      pending = [];
      return drained;
    },

    size(): number {
      return pending.length;
    }
  };
}
