import { loadEnvConfig } from "@/lib/config";
import {
  createDatabase,
  getEventsBySessionId,
  getLatestSessionId,
} from "@/lib/db/queries";

const REQUIRED_EVENTS = ["session_started", "player_action", "narrator_response"];

async function verifyEventLog() {
  const { postgresUrl } = loadEnvConfig();
  if (!postgresUrl) {
    console.log("POSTGRES_URL is not set; nothing to verify.");
    return;
  }

  const { db, close } = createDatabase(postgresUrl);
  try {
    const sessionId = process.argv[2] ?? (await getLatestSessionId(db));
    if (!sessionId) {
      console.log("No sessions recorded yet. Play a few turns first.");
      return;
    }

    console.log(`Checking events for session ${sessionId}...`);
    const events = await getEventsBySessionId(db, sessionId);
    for (const e of events) {
      console.log(`#${e.sequenceNum} [scene ${e.scene}] ${e.actor} ${e.eventType}: ${JSON.stringify(e.payload)}`);
    }

    console.log("\nVerification Results:");
    const missing = REQUIRED_EVENTS.filter(
      (eventType) => !events.some((e) => e.eventType === eventType)
    );
    for (const eventType of REQUIRED_EVENTS) {
      console.log(`${eventType}: ${missing.includes(eventType) ? "FAIL" : "PASS"}`);
    }

    if (missing.length > 0) {
      console.log("\nSOME CHECKS FAILED - the session may have ended before any narration.");
      process.exitCode = 1;
    } else {
      console.log("\nALL CHECKS PASSED");
    }
  } finally {
    await close();
  }
}

verifyEventLog().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
