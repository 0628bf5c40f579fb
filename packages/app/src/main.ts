import { resolve } from "node:path";
import { createLogger, errorMessage } from "@schema-scout/core";
import { replay } from "./replay.js";

const log = createLogger("app");

const scriptPath = process.argv[2];
if (!scriptPath) {
  log.error("Usage: npm run replay -- <script.yaml>");
  process.exitCode = 2;
} else {
  try {
    const report = await replay(resolve(scriptPath), { configPath: process.env.SCHEMA_SCOUT_CONFIG });
    process.exitCode = report.steps.every((s) => s.ok) ? 0 : 1;
  } catch (err) {
    log.error(errorMessage(err));
    process.exitCode = 1;
  }
}
