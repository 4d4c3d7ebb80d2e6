import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { FilesystemError, UnexpectedResponseError, errorMessage } from "./errors.js";
import { expandDownloadUrl, targetVersion } from "./version.js";
import type { HttpClient } from "./http.js";
import type { PreparedPackage, SupportedOs } from "../types/index.js";

export function downloadUrlFor(pkg: PreparedPackage, os: SupportedOs, latest: string): string {
  const template = os === "linux" ? pkg.descriptor.download_url.linux : pkg.descriptor.download_url.mac;
  return expandDownloadUrl(template, targetVersion(pkg, latest));
}

export function assetFileName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const base = path.posix.basename(pathname);
  return base.length > 0 ? base : "download";
}

/**
 * Streams the asset at `url` into `destDir`. A partial file is removed
 * when the request or the write fails.
 */
export async function downloadAsset(
  url: string,
  destDir: string,
  http: HttpClient,
  timeoutMs: number,
): Promise<string> {
  const destFile = path.join(destDir, assetFileName(url));
  try {
    fs.mkdirSync(destDir, { recursive: true });
  } catch (err) {
    throw new FilesystemError(`Cannot create ${destDir}: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const response = await http.get(url, { timeoutMs, followRedirects: true });
    if (!response.ok) {
      await response.body?.cancel();
      throw new UnexpectedResponseError(
        `download failed with status ${response.status}: ${url}`,
        response.status,
        url,
      );
    }
    if (!response.body) {
      throw new UnexpectedResponseError(`empty response body: ${url}`, response.status, url);
    }
    const body = Readable.fromWeb(response.body);
    await pipeline(body, fs.createWriteStream(destFile));
  } catch (err) {
    fs.rmSync(destFile, { force: true });
    throw err;
  }
  return destFile;
}
