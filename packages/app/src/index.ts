export { bootstrap } from "./bootstrap.js";
export type { BootstrapOptions, ScoutBootstrap } from "./bootstrap.js";
export { replay, loadReplayScript, formatReplaySummary, ReplayScriptSchema } from "./replay.js";
export type { ReplayScript, ReplayReport, ReplayStepOutcome, ReplayOptions } from "./replay.js";
