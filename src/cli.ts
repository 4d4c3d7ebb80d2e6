import { Command, CommanderError, InvalidArgumentError } from "commander";
import * as p from "@clack/prompts";
import { resolveSettings, type Env } from "./lib/config.js";
import { SetupError, errorMessage } from "./lib/errors.js";
import { createHttpClient } from "./lib/http.js";
import { ensureBinDir } from "./lib/installer.js";
import { logger } from "./lib/logger.js";
import { readPackagesFile } from "./lib/packages-file.js";
import { installAll, summarizeFailure } from "./lib/pipeline.js";
import { detectOs } from "./lib/platform.js";
import { isInteractive } from "./lib/prompts.js";
import { createWorkspace } from "./lib/workspace.js";
import type { CommandRunner, FetchLike, PreparedPackage, RunSummary } from "./types/index.js";

export const VERSION = "0.1.0";

export interface CliDeps {
  env?: Env;
  platform?: NodeJS.Platform;
  fetch?: FetchLike;
  runCommand?: CommandRunner;
  /** Parent of the per-run scratch directory. */
  tmpDir?: string;
  interactive?: boolean;
  output?: { writeOut(str: string): void; writeErr(str: string): void };
}

interface InstallOptions {
  binDir?: string;
  concurrency?: number;
  dryRun?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return n;
}

function selectPackages(packages: PreparedPackage[], names: string[]): PreparedPackage[] {
  if (names.length === 0) return packages;
  const known = new Set(packages.map((pkg) => pkg.descriptor.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new SetupError(`Unknown package(s): ${unknown.join(", ")}`);
  }
  const wanted = new Set(names);
  return packages.filter((pkg) => wanted.has(pkg.descriptor.name));
}

function printSummary(summary: RunSummary): void {
  if (summary.runs.length === 0) return;
  logger.blank();
  logger.table(
    ["Name", "Status", "Version"],
    summary.runs.map((run) => [run.name, run.state, run.targetVersion ?? "-"]),
  );
}

export async function runInstall(
  file: string,
  names: string[],
  options: InstallOptions,
  deps: CliDeps = {},
): Promise<number> {
  const env = deps.env ?? process.env;
  const interactive = deps.interactive ?? isInteractive();

  try {
    const os = detectOs(deps.platform);
    const settings = resolveSettings({ binDir: options.binDir, concurrency: options.concurrency }, env);
    const packages = selectPackages(readPackagesFile(file), names);
    ensureBinDir(settings.binDir);
    if (packages.length === 0) {
      logger.warn(`No packages listed in ${file}`);
      return 0;
    }

    if (interactive) {
      p.intro(`${options.dryRun ? "Checking" : "Installing"} ${packages.length} package(s) into ${settings.binDir}`);
    } else {
      logger.blank();
    }

    const workspace = createWorkspace(deps.tmpDir);
    let summary: RunSummary;
    try {
      summary = await installAll(
        packages,
        {
          os,
          binDir: settings.binDir,
          packageDir: workspace.packageDir,
          http: createHttpClient({ githubToken: settings.githubToken, fetch: deps.fetch }),
          runCommand: deps.runCommand,
          redirectTimeoutMs: settings.redirectTimeoutMs,
          downloadTimeoutMs: settings.downloadTimeoutMs,
          dryRun: options.dryRun,
        },
        settings.concurrency,
      );
    } finally {
      workspace.cleanup();
    }

    printSummary(summary);

    const failure = summarizeFailure(summary);
    if (failure) {
      if (interactive) {
        p.outro(failure);
      } else {
        logger.blank();
        logger.error(failure);
      }
      return 1;
    }

    if (interactive) {
      p.outro("Done!");
    } else {
      logger.blank();
    }
    return 0;
  } catch (err) {
    logger.error(errorMessage(err));
    return 1;
  }
}

export function createProgram(deps: CliDeps = {}, onExit: (code: number) => void = () => {}): Command {
  const program = new Command();

  program
    .name("binfetch")
    .description("Install the latest release binaries listed in a packages file.")
    .version(VERSION, "-V, --version")
    .helpOption("-h, --help", "Show usage")
    .argument("<packages-file>", "YAML file listing the packages to install")
    .argument("[names...]", "Only process these packages")
    .option("-d, --bin-dir <dir>", "Install binaries into this directory (default: $HOME/bin)")
    .option("-j, --concurrency <n>", "Number of packages processed at once (default: 3)", parsePositiveInt)
    .option("-n, --dry-run", "Resolve versions and report what would be installed")
    .showHelpAfterError()
    .exitOverride()
    .action(async (file: string, names: string[], options: InstallOptions) => {
      onExit(await runInstall(file, names, options, deps));
    });

  if (deps.output) {
    program.configureOutput(deps.output);
  }
  return program;
}

/** Parses argv and runs the tool, resolving with the process exit status. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // Usage output is treated as an unsuccessful run.
    if (err.code === "commander.helpDisplayed") return 1;
    return err.exitCode;
  }
  return exitCode;
}
