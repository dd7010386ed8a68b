import type { InferInsertModel, InferSelectModel } from "drizzle-orm";
import {
  integer,
  json,
  pgTable,
  timestamp,
  uuid,
  varchar,
  index,
} from "drizzle-orm/pg-core";

// One row per recorded session event (player actions, narration, failures)
export const eventLog = pgTable(
  "EventLog",
  {
    id: uuid("id").primaryKey().notNull().defaultRandom(),
    sessionId: uuid("sessionId").notNull(),
    sequenceNum: integer("sequenceNum").notNull(),
    eventType: varchar("eventType", { length: 100 }).notNull(),
    moduleName: varchar("moduleName", { length: 100 }).notNull().default("system"),
    actor: varchar("actor", { length: 50 }).notNull().default("system"),
    scene: integer("scene").notNull(),
    payload: json("payload").notNull().default({}),
    createdAt: timestamp("createdAt").notNull().defaultNow(),
  },
  (table) => [index("EventLog_session_idx").on(table.sessionId, table.sequenceNum)]
);

export type EventLog = InferSelectModel<typeof eventLog>;
export type NewEventLog = InferInsertModel<typeof eventLog>;
