import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { stringify } from "yaml";
import { main, type CliDeps } from "../src/cli.js";
import { logger } from "../src/lib/logger.js";
import { NotInstalledError } from "../src/lib/errors.js";
import { createTmpDir, descriptor, fakeFetch, fakeRunner, redirectTo, writeFile, type Route } from "./helpers.js";

let tmpDirs: string[] = [];

function useTmpDir(): string {
  const dir = createTmpDir();
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
  if (logger.isCapturing()) {
    logger.flush();
  }
});

const LATEST_URL = "https://github.com/example/tool/releases/latest";
const ASSET_URL = "https://dl.example.test/tool/v1.2.0/tool-1.2.0-linux";

function writePackagesFile(home: string): string {
  const tool = descriptor({
    download_url: {
      mac: "https://dl.example.test/tool/%v/tool-%n-darwin",
      linux: "https://dl.example.test/tool/%v/tool-%n-linux",
    },
  });
  return writeFile(home, "packages.yaml", stringify({ packages: [tool] }));
}

function outputSink() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    output: {
      writeOut: (str: string) => out.push(str),
      writeErr: (str: string) => err.push(str),
    },
  };
}

function deps(home: string, routes: Record<string, Route>, extra: Partial<CliDeps> = {}): CliDeps {
  return {
    env: { HOME: home },
    platform: "linux",
    fetch: fakeFetch(routes).fetch,
    runCommand: fakeRunner({ tool: new NotInstalledError("tool") }),
    tmpDir: home,
    interactive: false,
    ...extra,
  };
}

describe("main", () => {
  it("prints usage and exits 1 for --help", async () => {
    const sink = outputSink();
    const code = await main(["node", "binfetch", "--help"], { output: sink.output });
    expect(code).toBe(1);
    expect(sink.out.join("")).toContain("Usage: binfetch [options] <packages-file> [names...]");
  });

  it("prints the version and exits 0 for -V", async () => {
    const sink = outputSink();
    const code = await main(["node", "binfetch", "-V"], { output: sink.output });
    expect(code).toBe(0);
    expect(sink.out).toEqual(["0.1.0\n"]);
  });

  it("exits 1 when the packages file argument is missing", async () => {
    const sink = outputSink();
    const code = await main(["node", "binfetch"], { output: sink.output });
    expect(code).toBe(1);
    expect(sink.err.join("")).toContain("missing required argument 'packages-file'");
  });

  it("rejects a non-numeric concurrency", async () => {
    const sink = outputSink();
    const code = await main(["node", "binfetch", "-j", "two", "packages.yaml"], { output: sink.output });
    expect(code).toBe(1);
    expect(sink.err.join("")).toContain("must be a positive integer");
  });

  it("installs the latest release into $HOME/bin", async () => {
    const home = useTmpDir();
    const file = writePackagesFile(home);
    const routes: Record<string, Route> = {
      [LATEST_URL]: () => redirectTo("https://github.com/example/tool/releases/tag/v1.2.0"),
      [ASSET_URL]: () => new Response("tool-binary"),
    };

    logger.capture();
    const code = await main(["node", "binfetch", file], deps(home, routes));
    const messages = logger.flush();

    expect(code).toBe(0);
    expect(fs.readFileSync(path.join(home, "bin", "tool"), "utf-8")).toBe("tool-binary");
    expect(messages).toContain(`✓ tool: installed ${path.join(home, "bin", "tool")} v1.2.0`);
    expect(messages).toContain("  tool  installed  v1.2.0 ");
    expect(fs.readdirSync(home).sort()).toEqual(["bin", "packages.yaml"]);
  });

  it("leaves the bin directory untouched in dry-run mode", async () => {
    const home = useTmpDir();
    const file = writePackagesFile(home);
    const routes: Record<string, Route> = {
      [LATEST_URL]: () => redirectTo("https://github.com/example/tool/releases/tag/v1.2.0"),
    };

    logger.capture();
    const code = await main(["node", "binfetch", "--dry-run", file], deps(home, routes));
    const messages = logger.flush();

    expect(code).toBe(0);
    expect(fs.readdirSync(path.join(home, "bin"))).toEqual([]);
    expect(messages).toContain(`info tool: would download ${ASSET_URL}`);
  });

  it("exits 1 and names the failed packages", async () => {
    const home = useTmpDir();
    const file = writePackagesFile(home);
    const routes: Record<string, Route> = {
      [LATEST_URL]: () => redirectTo("https://github.com/example/tool/releases/tag/v1.2.0"),
    };

    logger.capture();
    const code = await main(["node", "binfetch", file], deps(home, routes));
    const messages = logger.flush();

    expect(code).toBe(1);
    expect(messages.at(-1)).toBe("error failed to install tool");
    expect(fs.existsSync(path.join(home, "bin", "tool"))).toBe(false);
    // The scratch directory is removed on failure too.
    expect(fs.readdirSync(home).sort()).toEqual(["bin", "packages.yaml"]);
  });

  it("exits 1 for a package name not in the file", async () => {
    const home = useTmpDir();
    const file = writePackagesFile(home);

    logger.capture();
    const code = await main(["node", "binfetch", file, "nope"], deps(home, {}));
    const messages = logger.flush();

    expect(code).toBe(1);
    expect(messages).toEqual(["error Unknown package(s): nope"]);
  });

  it("exits 1 on an unsupported platform", async () => {
    const home = useTmpDir();
    const file = writePackagesFile(home);

    logger.capture();
    const code = await main(["node", "binfetch", file], deps(home, {}, { platform: "win32" }));
    const messages = logger.flush();

    expect(code).toBe(1);
    expect(messages).toEqual([
      'error Unsupported platform "win32": only linux and darwin are supported',
    ]);
  });
});
