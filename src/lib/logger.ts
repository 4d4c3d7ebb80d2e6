const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const DIM = "\x1b[2m";

function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

let capturing = false;
let captured: string[] = [];

// Progress goes to stderr so stdout stays free for the summary table.
function emit(line: string, toStderr = true): void {
  if (capturing) {
    captured.push(stripAnsi(line));
  } else if (toStderr) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  info(msg: string) {
    emit(`${CYAN}info${RESET} ${msg}`);
  },

  success(msg: string) {
    emit(`${GREEN}✓${RESET} ${msg}`);
  },

  warn(msg: string) {
    emit(`${YELLOW}warn${RESET} ${msg}`);
  },

  error(msg: string) {
    emit(`${RED}error${RESET} ${msg}`);
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );
    const pad = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ");

    emit(`  ${DIM}${pad(headers.map((h) => h.toUpperCase()))}${RESET}`, false);
    for (const row of rows) {
      emit(`  ${pad(row)}`, false);
    }
  },

  blank() {
    emit("");
  },
};

export interface PackageLogger {
  info(msg: string): void;
  success(msg: string): void;
  error(msg: string): void;
}

/** Prefixes every line with the package name so interleaved worker output stays readable. */
export function packageLogger(name: string): PackageLogger {
  return {
    info: (msg) => logger.info(`${name}: ${msg}`),
    success: (msg) => logger.success(`${name}: ${msg}`),
    error: (msg) => logger.error(`${name}: ${msg}`),
  };
}
