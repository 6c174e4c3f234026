#!/usr/bin/env tsx
import { run } from "./cli";
import { errorMessage } from "./errors";

void (async () => {
  try {
    process.exitCode = await run(process.argv.slice(2), process.env);
  } catch (error) {
    console.error("Unexpected failure:", errorMessage(error));
    process.exitCode = 1;
  }
})();
