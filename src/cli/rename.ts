#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { loadConfig } from "../core/config.js";
import { ConfigurationError } from "../core/errors.js";
import { createExtractor } from "../core/extract.js";
import { createStrategy } from "../core/strategies.js";
import { runSession, type SessionDeps } from "./session.js";

async function main() {
  let session: SessionDeps;
  try {
    const config = loadConfig();
    session = {
      strategy: createStrategy(config),
      extract: createExtractor({ maxPages: config.maxPages }),
    };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`  [ERROR] ${err.message}`);
      return;
    }
    throw err;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await runSession({ ask: (q) => rl.question(q) }, session);
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
