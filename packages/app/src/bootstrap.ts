import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  LifecycleEmitter,
  ObservabilityDispatcher,
  TokenLedger,
  ToolLoggingPolicy,
  bestEffortAsync,
  createConsoleSink,
  createFileSink,
  createLogger,
  loadConfig,
  setConsoleLogLevel,
  verbosityToLevel,
  type AppConfig,
  type FileSink,
  type MetricSink,
  type ModelPricing,
} from "@schema-scout/core";
import {
  CapabilitySandbox,
  CommandRunner,
  HandleRegistry,
  SandboxedFileSystem,
  ToolRegistry,
  createCapabilityGrant,
  createToolExecutor,
  registerBuiltinTools,
  type ExecFileFn,
  type ToolExecutor,
} from "@schema-scout/tools";

const __dirname = dirname(fileURLToPath(import.meta.url));
// packages/app/src → repo root (3 levels up)
const ROOT_DIR = resolve(__dirname, "..", "..", "..");

export interface BootstrapOptions {
  /** Sinks added next to the configured console and file sinks. */
  extraSinks?: MetricSink[];
  /** Replaces `child_process.execFile` for `run_command`. */
  execFile?: ExecFileFn;
  /** Millisecond clock for durations. */
  now?: () => number;
}

export interface ScoutBootstrap {
  config: AppConfig;
  dispatcher: ObservabilityDispatcher;
  ledger: TokenLedger;
  sandbox: CapabilitySandbox;
  fs: SandboxedFileSystem;
  handles: HandleRegistry;
  registry: ToolRegistry;
  emitter: LifecycleEmitter;
  executeTool: ToolExecutor;
  /** Closes open handles, detaches the dispatcher and drains the file sink. */
  shutdown: () => Promise<void>;
}

function pricingOf(config: AppConfig): ModelPricing | undefined {
  const llm = config.llm;
  if (llm?.costPerMInputTokens === undefined || llm.costPerMOutputTokens === undefined) return undefined;
  return { costPerMInputTokens: llm.costPerMInputTokens, costPerMOutputTokens: llm.costPerMOutputTokens };
}

export function bootstrap(configPath?: string, options: BootstrapOptions = {}): ScoutBootstrap {
  const configLog = createLogger("config");
  const sandboxLog = createLogger("sandbox");
  const toolsLog = createLogger("tools");
  const metricsLog = createLogger("metrics");

  // ── 1. Config + logging ────────────────────────────────────────
  const resolvedConfigPath = configPath ?? resolve(ROOT_DIR, "config", "default.yaml");
  const config = loadConfig(resolvedConfigPath);
  setConsoleLogLevel(verbosityToLevel(config.logging.consoleVerbosity));
  configLog.log(
    `console=${config.logging.consoleVerbosity} file=${config.logging.fileEnabled ? config.logging.fileVerbosity : "off"}`,
  );

  // ── 2. Sandbox ─────────────────────────────────────────────────
  const sandbox = new CapabilitySandbox(createCapabilityGrant(config.sandbox));
  const { grant } = sandbox;
  sandboxLog.log(
    `read=[${grant.readableRoots.join(", ")}] write=[${grant.writableRoots.join(", ")}] ` +
    `exec=[${grant.executableCommands.join(", ")}]`,
  );
  const fs = new SandboxedFileSystem(sandbox);
  const runner = new CommandRunner(sandbox, {
    timeoutMs: config.sandbox.commandTimeoutMs,
    execFile: options.execFile,
  });

  // ── 3. Tools + policy ──────────────────────────────────────────
  const emitter = new LifecycleEmitter();
  const handles = new HandleRegistry(fs, { emitter });
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, { fs, runner, handles });
  const policy = ToolLoggingPolicy.fromRegistered(
    registry.policyEntries(),
    config.tools.loggingOverrides,
    { truncateLimit: config.tools.truncateLimit },
  );
  toolsLog.log(`${registry.names().length} tools: ${registry.names().join(", ")}`);

  // ── 4. Sinks + dispatcher ──────────────────────────────────────
  const sinks: MetricSink[] = [createConsoleSink(config.logging.consoleVerbosity)];
  let fileSink: FileSink | undefined;
  if (config.logging.fileEnabled) {
    fileSink = createFileSink({
      path: join(config.logging.logDir, config.logging.logFile),
      verbosity: config.logging.fileVerbosity,
      maxBytes: config.logging.maxFileBytes,
      maxFiles: config.logging.maxFiles,
    });
    sinks.push(fileSink);
    metricsLog.log(`Writing metrics to ${join(config.logging.logDir, config.logging.logFile)}`);
  }
  sinks.push(...(options.extraSinks ?? []));

  const ledger = new TokenLedger(pricingOf(config));
  const dispatcher = new ObservabilityDispatcher({ sinks, policy, ledger, now: options.now });
  const detach = dispatcher.attach(emitter);
  const executeTool = createToolExecutor((name) => registry.get(name), { dispatcher });

  const shutdown = async (): Promise<void> => {
    handles.closeAll();
    detach();
    await bestEffortAsync("close file sink", async () => fileSink?.close());
  };

  return { config, dispatcher, ledger, sandbox, fs, handles, registry, emitter, executeTool, shutdown };
}
