import { randomUUID } from "node:crypto";
import { createDatabase, createEvent } from "@/lib/db/queries";

export type SessionEventType =
  | "session_started"
  | "player_action"
  | "narrator_response"
  | "narrator_error";

export type SessionActor = "system" | "player" | "narrator";

export interface SessionEvent {
  eventType: SessionEventType;
  actor: SessionActor;
  scene: number;
  payload: Record<string, unknown>;
}

export interface RecordedEvent extends SessionEvent {
  sequenceNum: number;
}

export interface SessionRecorder {
  record(event: SessionEvent): Promise<void>;
  close(): Promise<void>;
}

export interface MemoryRecorder extends SessionRecorder {
  readonly events: RecordedEvent[];
}

export function createMemoryRecorder(): MemoryRecorder {
  const events: RecordedEvent[] = [];
  return {
    events,
    async record(event) {
      events.push({ ...event, sequenceNum: events.length + 1 });
    },
    async close() {},
  };
}

/**
 * Writes events to the EventLog table. Sequence numbers are per session
 * and start at 1; a failed insert does not use up its number.
 */
export function createDatabaseRecorder({
  url,
  sessionId = randomUUID(),
}: {
  url: string;
  sessionId?: string;
}): SessionRecorder & { sessionId: string } {
  const { db, close } = createDatabase(url);
  let sequenceNum = 0;

  return {
    sessionId,
    async record(event) {
      const next = sequenceNum + 1;
      await createEvent(db, {
        sessionId,
        sequenceNum: next,
        eventType: event.eventType,
        moduleName: "narrator",
        actor: event.actor,
        scene: event.scene,
        payload: event.payload,
      });
      sequenceNum = next;
    },
    close,
  };
}
