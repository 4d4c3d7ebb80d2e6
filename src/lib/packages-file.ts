import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod/v4";
import { ConfigParseError, errorMessage } from "./errors.js";
import type { PackageDescriptor, PackagesFile, PreparedPackage } from "../types/index.js";

const nonEmpty = z.string().trim().min(1, "must not be empty");
// Whitespace is significant in argv entries and patterns.
const verbatim = z.string().min(1, "must not be empty");

const descriptorSchema = z.object({
  name: nonEmpty,
  url: nonEmpty,
  download_url: z.object({
    mac: nonEmpty,
    linux: nonEmpty,
  }),
  version: z.object({
    command: z.array(verbatim).min(1, "must name at least the program to run"),
    format: verbatim,
    fixed: z
      .string({ error: 'must be a string, quote numeric versions (fixed: "2.0")' })
      .trim()
      .min(1, "must not be empty")
      .optional(),
  }),
});

const packagesFileSchema: z.ZodType<PackagesFile> = z.object({
  packages: z.array(descriptorSchema),
});

interface SchemaIssue {
  path: PropertyKey[];
  message: string;
}

function describeIssue(issue: SchemaIssue, data: unknown): string {
  const [root, index, ...rest] = issue.path;
  if (root === "packages" && typeof index === "number") {
    const name = entryName(data, index);
    const label = name ? `"${name}"` : `#${index + 1}`;
    const field = rest.map(String).join(".");
    return `package ${label}: ${field ? `${field}: ` : ""}${issue.message}`;
  }
  const field = issue.path.map(String).join(".");
  return `${field ? `${field}: ` : ""}${issue.message}`;
}

function entryName(data: unknown, index: number): string | undefined {
  if (!data || typeof data !== "object" || !("packages" in data)) return undefined;
  const { packages } = data;
  if (!Array.isArray(packages)) return undefined;
  const entry: unknown = packages[index];
  if (entry && typeof entry === "object" && "name" in entry && typeof entry.name === "string") {
    return entry.name;
  }
  return undefined;
}

function compileFormat(descriptor: PackageDescriptor): RegExp {
  let pattern: RegExp;
  try {
    pattern = new RegExp(descriptor.version.format);
  } catch (err) {
    throw new ConfigParseError(
      `package "${descriptor.name}": invalid version format: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  // An empty alternative always matches, so the match length gives the group count.
  const groups = new RegExp(`${descriptor.version.format}|`).exec("")?.length ?? 1;
  if (groups < 2) {
    throw new ConfigParseError(
      `package "${descriptor.name}": version format ${pattern} must contain a capture group`,
    );
  }
  return pattern;
}

function checkName(name: string): void {
  if (name === "." || name === ".." || name !== path.basename(name) || name.includes("\\")) {
    throw new ConfigParseError(`package "${name}": name must be a plain file name`);
  }
}

/**
 * Parses the packages file and compiles each version format once.
 * The returned descriptors are frozen; run state lives in PackageRun.
 */
export function parsePackagesFile(raw: string): PreparedPackage[] {
  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new ConfigParseError(`Invalid YAML: ${errorMessage(err)}`, { cause: err });
  }
  if (!data || typeof data !== "object") {
    throw new ConfigParseError("Invalid YAML: packages file must be a mapping with a packages list");
  }

  const result = packagesFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigParseError(issue ? describeIssue(issue, data) : "Invalid packages file");
  }

  const seen = new Set<string>();
  return result.data.packages.map((descriptor) => {
    checkName(descriptor.name);
    if (seen.has(descriptor.name)) {
      throw new ConfigParseError(`package "${descriptor.name}" is listed more than once`);
    }
    seen.add(descriptor.name);

    const versionPattern = compileFormat(descriptor);
    return {
      descriptor: Object.freeze(descriptor),
      versionPattern,
    };
  });
}

export function readPackagesFile(file: string): PreparedPackage[] {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new ConfigParseError(`Cannot read ${file}: ${errorMessage(err)}`, { cause: err });
  }
  return parsePackagesFile(raw);
}
