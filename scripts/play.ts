import { createInterface } from "node:readline/promises";
import { createGatewayBackend } from "@/lib/ai/backend";
import { loadEnvConfig } from "@/lib/config";
import { isGameError } from "@/lib/errors";
import {
  DEFAULT_LOCATION,
  createDefaultCompanions,
  createPlayerCharacter,
  createSessionState,
} from "@/lib/game-state";
import { createNarrationEngine } from "@/lib/narration";
import { createSeededRandom } from "@/lib/random";
import {
  createDatabaseRecorder,
  runSession,
  type SessionIO,
  type SessionRecorder,
} from "@/lib/session";

function parseArgv(argv: string[]) {
  const out: Record<string, string | boolean> = {};
  for (const raw of argv) {
    if (!raw.startsWith("--")) continue;
    const arg = raw.slice(2);
    if (!arg) continue;
    const eq = arg.indexOf("=");
    if (eq === -1) {
      out[arg] = true;
      continue;
    }
    out[arg.slice(0, eq)] = arg.slice(eq + 1);
  }
  return out;
}

function getStringFlag(flags: Record<string, string | boolean>, key: string) {
  const v = flags[key];
  return typeof v === "string" ? v : undefined;
}

async function main() {
  const config = loadEnvConfig();
  const flags = parseArgv(process.argv.slice(2));

  const player = createPlayerCharacter({
    name: getStringFlag(flags, "name"),
    ancestry: getStringFlag(flags, "ancestry"),
    characterClass: getStringFlag(flags, "class"),
  });
  const state = createSessionState({
    location: getStringFlag(flags, "location") ?? DEFAULT_LOCATION,
    party: flags["solo"] ? [player] : [player, ...createDefaultCompanions()],
  });

  const engine = createNarrationEngine({
    backend: config.apiKey
      ? createGatewayBackend({
          apiKey: config.apiKey,
          model: config.model,
          temperature: config.temperature,
        })
      : undefined,
    random:
      config.seed !== undefined ? createSeededRandom(config.seed) : undefined,
  });

  const recorder: SessionRecorder | undefined = config.postgresUrl
    ? createDatabaseRecorder({ url: config.postgresUrl })
    : undefined;

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const closed = new AbortController();
  rl.on("close", () => closed.abort());

  const io: SessionIO = {
    async prompt(question) {
      if (closed.signal.aborted) return null;
      try {
        return await rl.question(question, { signal: closed.signal });
      } catch (error) {
        if (closed.signal.aborted) return null;
        throw error;
      }
    },
    print: (text) => console.log(text),
  };

  try {
    const turns = await runSession({ state, engine, io, recorder });
    console.log(`[SESSION] Finished after ${turns} narrated turns`);
  } finally {
    rl.close();
    await recorder?.close();
  }
}

main().catch((error) => {
  if (isGameError(error)) {
    console.error(`[SESSION] ${error.toLogLine()}`);
  } else {
    console.error("[SESSION] Unexpected error:", error);
  }
  process.exitCode = 1;
});
