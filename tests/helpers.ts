import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import zlib from "node:zlib";
import type {
  CommandRunner,
  FetchLike,
  PackageDescriptor,
  PreparedPackage,
} from "../src/types/index.js";

export function descriptor(overrides: Partial<PackageDescriptor> = {}): PackageDescriptor {
  return {
    name: "tool",
    url: "https://github.com/example/tool",
    download_url: {
      mac: "https://github.com/example/tool/releases/download/%v/tool-%n-darwin.tar.gz",
      linux: "https://github.com/example/tool/releases/download/%v/tool-%n-linux.tar.gz",
    },
    version: {
      command: ["tool", "--version"],
      format: "tool version (\\S+)",
    },
    ...overrides,
  };
}

export function prepared(overrides: Partial<PackageDescriptor> = {}): PreparedPackage {
  const d = descriptor(overrides);
  return { descriptor: d, versionPattern: new RegExp(d.version.format) };
}

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "binfetch-test-"));
}

export function writeFile(dir: string, relativePath: string, content: string | Buffer): string {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
  return fullPath;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function redirectTo(location: string, status = 302): Response {
  return new Response(null, { status, headers: { Location: location } });
}

export type Route = () => Response | Promise<Response>;

export interface FakeFetch {
  fetch: FetchLike;
  calls: { url: string; init?: RequestInit }[];
}

/** Serves registered URLs; anything else gets a 404. */
export function fakeFetch(routes: Record<string, Route>): FakeFetch {
  const calls: { url: string; init?: RequestInit }[] = [];
  return {
    calls,
    fetch: async (url, init) => {
      calls.push({ url, init });
      const route = routes[url];
      return route ? route() : new Response("not found", { status: 404 });
    },
  };
}

/** Answers version commands from a table keyed by the program name. */
export function fakeRunner(outputs: Record<string, string | Error>): CommandRunner {
  return async (argv) => {
    const out = outputs[argv[0] ?? ""];
    if (out === undefined) throw new Error(`unexpected command ${argv.join(" ")}`);
    if (out instanceof Error) throw out;
    return { stdout: out, exitCode: 0 };
  };
}

export interface ZipEntry {
  name: string;
  content?: string | Buffer;
  deflate?: boolean;
}

/** Builds a minimal zip archive (no CRCs, no data descriptors). */
export function buildZip(entries: ZipEntry[]): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, "utf8");
    const raw = entry.content === undefined ? Buffer.alloc(0) : Buffer.from(entry.content);
    const data = entry.deflate ? zlib.deflateRawSync(raw) : raw;
    const method = entry.deflate ? 8 : 0;

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(raw.length, 22);
    local.writeUInt16LE(name.length, 26);
    locals.push(local, name, data);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(method, 10);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(raw.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(offset, 42);
    centrals.push(central, name);

    offset += local.length + name.length + data.length;
  }

  const centralDir = Buffer.concat(centrals);
  const eocd = Buffer.alloc(22);
  eocd.writeUInt32LE(0x06054b50, 0);
  eocd.writeUInt16LE(entries.length, 8);
  eocd.writeUInt16LE(entries.length, 10);
  eocd.writeUInt32LE(centralDir.length, 12);
  eocd.writeUInt32LE(offset, 16);

  return Buffer.concat([...locals, centralDir, eocd]);
}
