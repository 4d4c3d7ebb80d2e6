import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export interface Workspace {
  dir: string;
  packageDir(name: string): string;
  cleanup(): void;
}

/** A per-run scratch directory; each package downloads into its own subdirectory. */
export function createWorkspace(parent: string = os.tmpdir()): Workspace {
  const dir = fs.mkdtempSync(path.join(parent, "binfetch-"));
  return {
    dir,
    packageDir: (name) => path.join(dir, name),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
