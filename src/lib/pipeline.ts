import { NotInstalledError, errorMessage, toError } from "./errors.js";
import { downloadAsset, downloadUrlFor } from "./fetcher.js";
import { selectBinary } from "./extractor.js";
import { installBinary } from "./installer.js";
import { packageLogger } from "./logger.js";
import { runBounded } from "./pool.js";
import { resolveCurrentVersion, resolveLatestVersion, runCommand } from "./resolver.js";
import { isAlreadyLatest, targetVersion } from "./version.js";
import type { HttpClient } from "./http.js";
import type {
  CommandRunner,
  PackageRun,
  PreparedPackage,
  RunSummary,
  SupportedOs,
} from "../types/index.js";

export interface PipelineContext {
  os: SupportedOs;
  binDir: string;
  /** Directory a package's download and extraction happen in. */
  packageDir: (name: string) => string;
  http: HttpClient;
  runCommand?: CommandRunner;
  redirectTimeoutMs: number;
  downloadTimeoutMs: number;
  dryRun?: boolean;
}

async function advance(pkg: PreparedPackage, run: PackageRun, ctx: PipelineContext): Promise<void> {
  const { name, url } = pkg.descriptor;
  const log = packageLogger(name);

  try {
    run.currentVersion = await resolveCurrentVersion(pkg, ctx.runCommand ?? runCommand);
    log.info(`current version is ${run.currentVersion}`);
  } catch (err) {
    if (!(err instanceof NotInstalledError)) throw err;
    log.info("not installed");
  }

  const latest = await resolveLatestVersion(url, ctx.http, ctx.redirectTimeoutMs);
  run.latestVersion = latest;
  run.targetVersion = targetVersion(pkg, latest);
  run.state = "version-resolved";
  log.info(`latest version is ${latest}`);
  if (pkg.descriptor.version.fixed) {
    log.info(`using fixed version ${pkg.descriptor.version.fixed}`);
  }

  if (isAlreadyLatest(run.currentVersion, pkg, latest)) {
    run.state = "already-latest";
    log.info("already have the latest version");
    return;
  }

  run.downloadUrl = downloadUrlFor(pkg, ctx.os, latest);
  if (ctx.dryRun) {
    run.state = "outdated";
    log.info(`would download ${run.downloadUrl}`);
    return;
  }

  log.info(`downloading ${run.downloadUrl}`);
  run.downloadFile = await downloadAsset(
    run.downloadUrl,
    ctx.packageDir(name),
    ctx.http,
    ctx.downloadTimeoutMs,
  );
  run.state = "downloaded";

  run.binaryFile = await selectBinary(run.downloadFile);
  run.state = "extracted";

  run.installedPath = installBinary(run.binaryFile, ctx.binDir, name);
  run.state = "installed";
  log.success(`installed ${run.installedPath} ${run.targetVersion}`);
}

/**
 * Takes one package from version check to installed binary. Never rejects:
 * a failure at any stage ends the run record in the "failed" state.
 */
export async function runPackage(pkg: PreparedPackage, ctx: PipelineContext): Promise<PackageRun> {
  const run: PackageRun = { name: pkg.descriptor.name, state: "pending" };
  try {
    await advance(pkg, run, ctx);
  } catch (err) {
    run.state = "failed";
    run.error = toError(err);
    packageLogger(run.name).error(`failed, ${errorMessage(err)}`);
  }
  return run;
}

/** Runs every package through the pipeline with at most `concurrency` in flight. */
export async function installAll(
  packages: readonly PreparedPackage[],
  ctx: PipelineContext,
  concurrency: number,
): Promise<RunSummary> {
  const settled = await runBounded(packages, concurrency, (pkg) => runPackage(pkg, ctx));

  const runs: PackageRun[] = [];
  const failed: string[] = [];
  settled.forEach((result, i) => {
    const run: PackageRun =
      result.status === "fulfilled"
        ? result.value
        : { name: packages[i]?.descriptor.name ?? `#${i + 1}`, state: "failed", error: toError(result.reason) };
    runs.push(run);
    if (run.state === "failed") failed.push(run.name);
  });

  return { runs, failed };
}

export function summarizeFailure(summary: RunSummary): string | undefined {
  if (summary.failed.length === 0) return undefined;
  return `failed to install ${summary.failed.join(", ")}`;
}
