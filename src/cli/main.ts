#!/usr/bin/env node
/**
 * drone-step-comment entrypoint. Exit 0 on a posted comment or a deliberate
 * skip, exit 1 with the reason on stderr for anything fatal.
 */

import { errorMessage } from "../errors.js";
import { runPlugin } from "../plugin.js";
import { LOG_PREFIX } from "../util/log.js";

async function main(): Promise<void> {
  await runPlugin(process.env);
}

main().catch((err: unknown) => {
  console.error(LOG_PREFIX, errorMessage(err));
  process.exit(1);
});
