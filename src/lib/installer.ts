import fs from "node:fs";
import path from "node:path";
import { FilesystemError, SetupError, errorMessage, isErrnoException } from "./errors.js";

const EXECUTABLE_MODE = 0o755;

export function ensureBinDir(dir: string): void {
  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(dir);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "ENOENT") {
      throw new SetupError(`Cannot access ${dir}: ${errorMessage(err)}`, { cause: err });
    }
  }
  if (stat) {
    if (!stat.isDirectory()) {
      throw new SetupError(`${dir} is not a directory`);
    }
    return;
  }
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new SetupError(`Failed to create ${dir}: ${errorMessage(err)}`, { cause: err });
  }
}

export function getBinaryPath(binDir: string, name: string): string {
  return path.join(binDir, name);
}

function moveIntoPlace(source: string, target: string): void {
  try {
    fs.renameSync(source, target);
    return;
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "EXDEV") throw err;
  }

  // Across filesystems: stage a copy beside the target, then rename over it.
  const staged = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  try {
    fs.copyFileSync(source, staged);
    fs.chmodSync(staged, EXECUTABLE_MODE);
    fs.renameSync(staged, target);
  } catch (err) {
    fs.rmSync(staged, { force: true });
    throw err;
  }
  fs.rmSync(source, { force: true });
}

/**
 * Marks `source` executable and moves it to `<binDir>/<name>`, replacing
 * whatever was installed there.
 */
export function installBinary(source: string, binDir: string, name: string): string {
  const target = getBinaryPath(binDir, name);
  try {
    fs.chmodSync(source, EXECUTABLE_MODE);
    moveIntoPlace(source, target);
  } catch (err) {
    throw new FilesystemError(`Cannot install ${name} to ${target}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return target;
}
