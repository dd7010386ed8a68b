export { QUIT_COMMANDS, SESSION_TEXT, runSession, type SessionIO } from "./loop";
export {
  createDatabaseRecorder,
  createMemoryRecorder,
  type MemoryRecorder,
  type RecordedEvent,
  type SessionActor,
  type SessionEvent,
  type SessionEventType,
  type SessionRecorder,
} from "./recorder";
