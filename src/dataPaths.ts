import fs from "node:fs";
import path from "node:path";
import { cfg } from "./config/env.js";

type ResolveOptions = {
  ensureExists?: boolean;
};

function ensureDirIfRequested(dirPath: string, ensureExists?: boolean): string {
  if (ensureExists) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
  return dirPath;
}

export function getDataRoot(): string {
  return path.resolve(cfg.data.root);
}

/** DATA_BACKUPS_DIR is taken relative to the data root unless absolute. */
export function resolveBackupsDir(opts: ResolveOptions = {}): string {
  return ensureDirIfRequested(path.resolve(getDataRoot(), cfg.data.backupsDir), opts.ensureExists);
}

export function resolvePidPath(): string {
  return path.join(ensureDirIfRequested(getDataRoot(), true), "bot.pid");
}
