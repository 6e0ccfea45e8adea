import path from "node:path";
import { compileExcludes, isExcluded, toPosix, type PathFilter } from "./glob.js";
import type { Logger } from "./log.js";
import type { RuleCandidate } from "./types.js";

export type RuleFileOptions = {
  // rules directory, relative to the repository root, without surrounding slashes
  dir: string;
  extension: string;
  exclude: string[];
};

/** Decides which listed paths are rule files. Paths are repository-relative. */
export class RuleFileMatcher {
  private readonly excludes: PathFilter;

  constructor(private readonly opts: RuleFileOptions) {
    this.excludes = compileExcludes(opts.exclude);
  }

  matches(repoPath: string): boolean {
    const p = toPosix(repoPath);
    if (!p.endsWith(this.opts.extension)) return false;
    return !isExcluded(relativeToDir(p, this.opts.dir), this.excludes);
  }
}

function relativeToDir(p: string, dir: string) {
  if (!dir) return p;
  return p.startsWith(`${dir}/`) ? p.slice(dir.length + 1) : p;
}

export function ruleNameFromPath(p: string) {
  const base = path.posix.basename(toPosix(p));
  const ext = path.posix.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Turns fetched bytes into a candidate. Empty (after trim) and non-UTF-8
 * files are logged and yield null.
 */
export function toCandidate(sourcePath: string, bytes: Uint8Array, log: Logger): RuleCandidate | null {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    log.error(`Could not decode content of file '${sourcePath}' as UTF-8. Skipping.`);
    return null;
  }
  if (!text.trim()) {
    log.warn(`Rule file '${sourcePath}' is empty. Skipping.`);
    return null;
  }
  log.debug(`Successfully fetched content for ${sourcePath}`);
  return { name: ruleNameFromPath(sourcePath), text, sourcePath };
}
