import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import * as tar from "tar";
import { ExtractionError, FilesystemError, errorMessage } from "./errors.js";

export type ArchiveKind = "tar.gz" | "zip";

const EXTRACT_DIR = "__extract";

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;
const ZIP64_MARKER = 0xffffffff;
const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

export function archiveKind(file: string): ArchiveKind | undefined {
  const name = path.basename(file).toLowerCase();
  if (name.endsWith(".tar.gz") || name.endsWith(".tgz")) return "tar.gz";
  if (name.endsWith(".zip")) return "zip";
  return undefined;
}

function findEndOfCentralDirectory(buffer: Buffer): number {
  for (let offset = buffer.length - 22; offset >= 0; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE) return offset;
  }
  return -1;
}

function safeJoin(root: string, entryName: string): string {
  const target = path.resolve(root, entryName);
  const relative = path.relative(root, target);
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ExtractionError(`Refusing to extract "${entryName}" outside of ${root}`);
  }
  return target;
}

function inflateEntry(data: Buffer, method: number, name: string): Buffer {
  switch (method) {
    case 0:
      return data;
    case 8:
      return zlib.inflateRawSync(data);
    default:
      throw new ExtractionError(`Unsupported compression method ${method} for "${name}"`);
  }
}

/**
 * Extracts every entry of a zip archive by walking its central directory.
 * Stored and deflated entries are supported; zip64 archives are not.
 */
export function extractZip(archivePath: string, destDir: string): void {
  const buffer = fs.readFileSync(archivePath);
  const eocd = findEndOfCentralDirectory(buffer);
  if (eocd < 0) {
    throw new ExtractionError(`Invalid zip file: end of central directory not found in ${archivePath}`);
  }

  const entryCount = buffer.readUInt16LE(eocd + 10);
  let offset = buffer.readUInt32LE(eocd + 16);

  for (let i = 0; i < entryCount; i++) {
    if (offset + 46 > buffer.length || buffer.readUInt32LE(offset) !== CENTRAL_SIGNATURE) {
      throw new ExtractionError(`Invalid zip file: corrupt central directory in ${archivePath}`);
    }

    const method = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const uncompressedSize = buffer.readUInt32LE(offset + 24);
    const nameLength = buffer.readUInt16LE(offset + 28);
    const extraLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const externalAttributes = buffer.readUInt32LE(offset + 38);
    const localOffset = buffer.readUInt32LE(offset + 42);
    const name = buffer.toString("utf8", offset + 46, offset + 46 + nameLength);
    offset += 46 + nameLength + extraLength + commentLength;

    if (compressedSize === ZIP64_MARKER || uncompressedSize === ZIP64_MARKER) {
      throw new ExtractionError(`Zip64 archives are not supported: ${archivePath}`);
    }

    const target = safeJoin(destDir, name);
    if (name.endsWith("/")) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    // Symlinks carry their target as content; they are never the binary.
    if (((externalAttributes >>> 16) & S_IFMT) === S_IFLNK) continue;

    if (buffer.readUInt32LE(localOffset) !== LOCAL_SIGNATURE) {
      throw new ExtractionError(`Invalid local file header for "${name}" in ${archivePath}`);
    }
    const localNameLength = buffer.readUInt16LE(localOffset + 26);
    const localExtraLength = buffer.readUInt16LE(localOffset + 28);
    const dataOffset = localOffset + 30 + localNameLength + localExtraLength;

    const data = inflateEntry(buffer.subarray(dataOffset, dataOffset + compressedSize), method, name);
    if (data.length !== uncompressedSize) {
      throw new ExtractionError(`Decompression size mismatch for "${name}" in ${archivePath}`);
    }

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, data);
  }
}

export async function extractTarGz(archivePath: string, destDir: string): Promise<void> {
  await tar.x({ file: archivePath, cwd: destDir });
}

export async function extractArchive(
  archivePath: string,
  destDir: string,
  kind: ArchiveKind,
): Promise<void> {
  try {
    if (kind === "tar.gz") {
      await extractTarGz(archivePath, destDir);
    } else {
      extractZip(archivePath, destDir);
    }
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(`Cannot extract ${archivePath}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Returns the largest regular file under `dir`. Entries are visited in
 * sorted depth-first order and the first of equally sized files wins.
 */
export function findLargestFile(dir: string): string | undefined {
  let best: { file: string; size: number } | undefined;
  for (const file of listFiles(dir)) {
    const { size } = fs.statSync(file);
    if (!best || size > best.size) {
      best = { file, size };
    }
  }
  return best?.file;
}

function listFiles(dir: string): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return entries.flatMap((entry) => {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) return listFiles(full);
    return entry.isFile() ? [full] : [];
  });
}

/**
 * Picks the file to install from a download. Plain files are used as they
 * are; archives are extracted next to the download and the largest file
 * inside is taken as the binary.
 */
export async function selectBinary(downloadFile: string): Promise<string> {
  const kind = archiveKind(downloadFile);
  if (!kind) return downloadFile;

  const extractDir = path.join(path.dirname(downloadFile), EXTRACT_DIR);
  try {
    fs.mkdirSync(extractDir);
  } catch (err) {
    throw new FilesystemError(`Cannot create ${extractDir}: ${errorMessage(err)}`, { cause: err });
  }

  await extractArchive(downloadFile, extractDir, kind);

  const binary = findLargestFile(extractDir);
  if (!binary) {
    throw new ExtractionError(`No files found in ${path.basename(downloadFile)}`);
  }
  return binary;
}
