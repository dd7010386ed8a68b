import { asc, desc, eq } from "drizzle-orm";
import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { GameError } from "../errors";
import { type EventLog, eventLog, type NewEventLog } from "./schema";

export type Database = PostgresJsDatabase;

export function createDatabase(url: string): {
  db: Database;
  close: () => Promise<void>;
} {
  const client = postgres(url);
  return {
    db: drizzle(client),
    close: () => client.end(),
  };
}

export async function createEvent(
  db: Database,
  values: NewEventLog
): Promise<EventLog> {
  try {
    const [newEvent] = await db.insert(eventLog).values(values).returning();
    return newEvent;
  } catch (error) {
    throw new GameError("bad_request:database", {
      detail: "Failed to create event",
      cause: error,
    });
  }
}

export async function getEventsBySessionId(
  db: Database,
  sessionId: string
): Promise<EventLog[]> {
  try {
    return await db
      .select()
      .from(eventLog)
      .where(eq(eventLog.sessionId, sessionId))
      .orderBy(asc(eventLog.sequenceNum));
  } catch (error) {
    throw new GameError("bad_request:database", {
      detail: "Failed to get events by session id",
      cause: error,
    });
  }
}

export async function getLatestSessionId(db: Database): Promise<string | null> {
  try {
    const [latest] = await db
      .select({ sessionId: eventLog.sessionId })
      .from(eventLog)
      .orderBy(desc(eventLog.createdAt))
      .limit(1);
    return latest?.sessionId ?? null;
  } catch (error) {
    throw new GameError("bad_request:database", {
      detail: "Failed to get latest session",
      cause: error,
    });
  }
}
