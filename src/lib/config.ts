import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod/v4";
import { SetupError, errorMessage, isErrnoException } from "./errors.js";
import type { BinfetchConfig, Settings } from "../types/index.js";

const DEFAULT_CONCURRENCY = 3;
const DEFAULT_REDIRECT_TIMEOUT_MS = 5_000;
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;

const configSchema: z.ZodType<BinfetchConfig> = z.object({
  bin_dir: z.string().optional(),
  concurrency: z.number().int().positive().optional(),
  timeouts: z
    .object({
      redirect_ms: z.number().positive().optional(),
      download_ms: z.number().positive().optional(),
    })
    .optional(),
  auth: z.object({ github_token: z.string().optional() }).optional(),
});

export type Env = Record<string, string | undefined>;

export function getHomeDir(env: Env = process.env): string {
  const home = env["HOME"];
  if (!home) {
    throw new SetupError("HOME is not set");
  }
  return home;
}

export function getConfigDir(env: Env = process.env): string {
  return path.join(getHomeDir(env), ".binfetch");
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getConfigDir(env), "config");
}

export function readConfig(env: Env = process.env): BinfetchConfig {
  const configPath = getConfigPath(env);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return {};
    throw new SetupError(`Cannot read ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new SetupError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  if (data === null || data === undefined) return {};

  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ` : "";
    throw new SetupError(`Invalid config ${configPath}: ${where}${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}

export interface SettingsOverrides {
  binDir?: string;
  concurrency?: number;
}

/**
 * Merges settings from CLI flags, environment and ~/.binfetch/config,
 * in that order of precedence.
 */
export function resolveSettings(overrides: SettingsOverrides = {}, env: Env = process.env): Settings {
  const home = getHomeDir(env);
  const config = readConfig(env);

  const binDir = overrides.binDir ?? env["BINFETCH_BIN_DIR"] ?? config.bin_dir ?? path.join(home, "bin");
  const concurrency = overrides.concurrency ?? config.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new SetupError(`Invalid concurrency "${concurrency}": must be a positive integer`);
  }

  return {
    binDir: expandHome(binDir, home),
    concurrency,
    redirectTimeoutMs: config.timeouts?.redirect_ms ?? DEFAULT_REDIRECT_TIMEOUT_MS,
    downloadTimeoutMs: config.timeouts?.download_ms ?? DEFAULT_DOWNLOAD_TIMEOUT_MS,
    githubToken: env["BINFETCH_GITHUB_TOKEN"] || config.auth?.github_token || undefined,
  };
}

function expandHome(dir: string, home: string): string {
  if (dir === "~") return home;
  if (dir.startsWith("~/")) return path.join(home, dir.slice(2));
  return path.resolve(dir);
}
