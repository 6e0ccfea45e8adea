import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import fg from "fast-glob";
import { RuleFileMatcher, toCandidate, type RuleFileOptions } from "./candidates.js";
import type { Logger } from "./log.js";
import type { RuleCandidate, RuleSource } from "./types.js";

export type LocalSourceOptions = RuleFileOptions & {
  root: string;
  recursive?: boolean;
  logger: Logger;
};

/** Rule files read from a working copy (e.g. the CI checkout). */
export class LocalRuleSource implements RuleSource {
  private readonly matcher: RuleFileMatcher;

  constructor(private readonly opts: LocalSourceOptions) {
    this.matcher = new RuleFileMatcher(opts);
  }

  describe() {
    return `working copy ${path.join(this.opts.root, this.opts.dir)}`;
  }

  async listRuleCandidates(): Promise<RuleCandidate[] | null> {
    const { root, dir, extension, recursive } = this.opts;
    const log = this.opts.logger;
    const base = path.resolve(root, dir);
    log.info(`Fetching rule files from ${this.describe()}`);
    if (!fss.existsSync(base) || !fss.statSync(base).isDirectory()) {
      log.error(`Rules directory not found: ${base}`);
      return null;
    }

    const pattern = `${recursive ? "**/" : ""}*${extension}`;
    const found = await fg([pattern], { cwd: base, onlyFiles: true, dot: false, ignore: ["**/node_modules/**", "**/.git/**"] });
    // repository-relative, forward slashes, like the Bitbucket listing
    const files = found
      .map(f => (dir ? `${dir}/${f}` : f))
      .filter(f => this.matcher.matches(f))
      .sort();

    const candidates: RuleCandidate[] = [];
    for (const f of files) {
      log.info(`Found rule file: ${f}`);
      let bytes: Uint8Array;
      try {
        bytes = await fs.readFile(path.join(root, f));
      } catch (e) {
        log.error(`Failed to read rule file: ${f} (${e instanceof Error ? e.message : String(e)})`);
        continue;
      }
      const candidate = toCandidate(f, bytes, log);
      if (candidate) candidates.push(candidate);
    }
    log.info(`Finished reading the working copy. Found ${candidates.length} rule files.`);
    return candidates;
  }
}
