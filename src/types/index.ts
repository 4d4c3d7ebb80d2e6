// ── Packages file (packages.yml) ──

export type SupportedOs = "linux" | "mac";

export interface DownloadUrls {
  mac: string;
  linux: string;
}

export interface VersionSpec {
  command: string[];
  format: string;
  fixed?: string;
}

export interface PackageDescriptor {
  name: string;
  url: string;
  download_url: DownloadUrls;
  version: VersionSpec;
}

export interface PackagesFile {
  packages: PackageDescriptor[];
}

/** A descriptor plus the values derived from it once at load time. */
export interface PreparedPackage {
  readonly descriptor: Readonly<PackageDescriptor>;
  readonly versionPattern: RegExp;
}

// ── Per-run state ──

export type PackageState =
  | "pending"
  | "version-resolved"
  | "already-latest"
  | "outdated"
  | "downloaded"
  | "extracted"
  | "installed"
  | "failed";

export interface PackageRun {
  name: string;
  state: PackageState;
  currentVersion?: string;
  latestVersion?: string;
  targetVersion?: string;
  downloadUrl?: string;
  downloadFile?: string;
  binaryFile?: string;
  installedPath?: string;
  error?: Error;
}

export interface RunSummary {
  runs: PackageRun[];
  failed: string[];
}

// ── I/O seams ──

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CommandOutput {
  stdout: string;
  exitCode: number;
}

export type CommandRunner = (argv: string[]) => Promise<CommandOutput>;

// ── Config ──

export interface BinfetchConfig {
  bin_dir?: string;
  concurrency?: number;
  timeouts?: {
    redirect_ms?: number;
    download_ms?: number;
  };
  auth?: {
    github_token?: string;
  };
}

export interface Settings {
  binDir: string;
  concurrency: number;
  redirectTimeoutMs: number;
  downloadTimeoutMs: number;
  githubToken?: string;
}
