import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../errors.js";
import { AppConfigSchema, type AppConfig } from "../schemas/config.schema.js";

function substituteEnvVars(text: string, env: NodeJS.ProcessEnv): string {
  return text.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
    return env[varName] ?? "";
  });
}

function resolvePaths(paths: readonly string[], baseDir: string): string[] {
  return paths.map((p) => (isAbsolute(p) ? p : resolve(baseDir, p)));
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Read, substitute and validate a YAML config. Relative paths in the file
 * (log directory, sandbox roots) are resolved against the file's directory.
 * The sandbox section is frozen.
 */
export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): AppConfig {
  const filePath = configPath ?? resolve(process.cwd(), "config", "default.yaml");
  const baseDir = dirname(resolve(filePath));

  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(substituteEnvVars(raw, options.env ?? process.env)) ?? {};
  } catch (err) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { cause: err });
  }

  const result = AppConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const config = result.data;
  const { sandbox } = config;
  return {
    ...config,
    logging: { ...config.logging, logDir: resolve(baseDir, config.logging.logDir) },
    sandbox: Object.freeze({
      ...sandbox,
      readableRoots: Object.freeze(resolvePaths(sandbox.readableRoots, baseDir)),
      writableRoots: Object.freeze(resolvePaths(sandbox.writableRoots, baseDir)),
      executableCommands: Object.freeze([...sandbox.executableCommands]),
      ...(sandbox.workingDirectory ? { workingDirectory: resolve(baseDir, sandbox.workingDirectory) } : {}),
    }),
  };
}
