import { execFile } from "node:child_process";
import {
  FormatMismatchError,
  NotInstalledError,
  UnexpectedResponseError,
  isErrnoException,
} from "./errors.js";
import type { HttpClient } from "./http.js";
import type { CommandOutput, CommandRunner, PreparedPackage } from "../types/index.js";

/**
 * Runs argv without a shell. Resolves with stdout even on a non-zero exit;
 * rejects with NotInstalledError when the program is not on PATH.
 */
export const runCommand: CommandRunner = (argv) => {
  const [program, ...args] = argv;
  if (!program) {
    return Promise.reject(new Error("empty version command"));
  }
  return new Promise<CommandOutput>((resolve, reject) => {
    execFile(program, args, { encoding: "utf-8" }, (err, stdout) => {
      if (!err) {
        resolve({ stdout, exitCode: 0 });
        return;
      }
      const code: string | number | null | undefined = err.code;
      if (code === "ENOENT") {
        reject(new NotInstalledError(program));
      } else if (typeof code === "number") {
        resolve({ stdout, exitCode: code });
      } else {
        reject(err);
      }
    });
  });
};

export async function resolveCurrentVersion(
  pkg: PreparedPackage,
  run: CommandRunner = runCommand,
): Promise<string> {
  const { command } = pkg.descriptor.version;
  let output: CommandOutput;
  try {
    output = await run(command);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new NotInstalledError(command[0] ?? "");
    }
    throw err;
  }

  const match = pkg.versionPattern.exec(output.stdout);
  const version = match?.[1];
  if (version === undefined) {
    if (output.exitCode !== 0) {
      throw new Error(`${command.join(" ")} exited with status ${output.exitCode}`);
    }
    throw new FormatMismatchError(pkg.versionPattern);
  }
  return version;
}

function lastPathSegment(location: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(location, "http://localhost").pathname;
  } catch {
    pathname = location;
  }
  const segments = pathname.split("/").filter((s) => s.length > 0);
  const last = segments[segments.length - 1];
  if (last === undefined) return undefined;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

export function latestReleaseUrl(sourceUrl: string): string {
  return `${sourceUrl.replace(/\/+$/, "")}/releases/latest`;
}

/**
 * Asks the "latest release" endpoint where it redirects to and takes the
 * version tag from the last segment of the Location header.
 */
export async function resolveLatestVersion(
  sourceUrl: string,
  http: HttpClient,
  timeoutMs: number,
): Promise<string> {
  const url = latestReleaseUrl(sourceUrl);
  const response = await http.get(url, { timeoutMs, followRedirects: false });
  await response.body?.cancel();

  if (response.status < 300 || response.status >= 400) {
    throw new UnexpectedResponseError(
      `expected a 3XX response, but got ${response.status}: ${url}`,
      response.status,
      url,
    );
  }

  const location = response.headers.get("location");
  const version = location ? lastPathSegment(location) : undefined;
  if (!version) {
    throw new UnexpectedResponseError(
      `response from ${url} does not contain a Location header`,
      response.status,
      url,
    );
  }
  return version;
}
