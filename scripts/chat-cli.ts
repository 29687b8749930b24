import readline from "node:readline/promises";
import { buildIntakeRuntime } from "../src/app";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { createSession } from "../src/state/session.service";

async function main(): Promise<void> {
  const env = loadEnv();
  // Only warnings and errors, so log lines don't interleave with the chat.
  const logger = createLogger({ minLevel: "warn" });
  const { engine, llmClient } = buildIntakeRuntime(env, logger);

  const status = await llmClient.checkStatus();
  process.stdout.write(
    `LLM ${status.connected ? "connected" : "unreachable"} at ${status.endpoint} (model ${status.model}` +
      `${status.modelAvailable ? "" : ", not pulled"})\n\n`,
  );

  const session = createSession();
  process.stdout.write(`Assistant: ${(await engine.start(session)).reply}\n\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const text = (await rl.question("You: ")).trim();
      if (!text) {
        continue;
      }
      const turn = await engine.handleMessage(session, text);
      process.stdout.write(`\nAssistant: ${turn.reply}\n\n`);
      if (turn.ended) {
        break;
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
