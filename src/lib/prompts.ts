import type { Env } from "./config.js";

/**
 * Clack output is only used on a real terminal; piped runs and CI get plain
 * log lines.
 */
export function isInteractive(
  stream: { isTTY?: boolean } = process.stdout,
  env: Env = process.env,
): boolean {
  return Boolean(stream.isTTY) && !env["CI"];
}
