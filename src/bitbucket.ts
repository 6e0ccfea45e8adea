import { z } from "zod";
import { HttpClient, type HttpClientOptions } from "./http.js";
import { paginate, PageError } from "./paginate.js";
import { RuleFileMatcher, toCandidate, type RuleFileOptions } from "./candidates.js";
import type { Logger } from "./log.js";
import type { RuleCandidate, RuleSource } from "./types.js";

export const BITBUCKET_API_BASE_URL = "https://api.bitbucket.org/2.0";

// Entries without a type or path are skipped, not fatal to the listing.
const SrcEntrySchema = z
  .object({
    type: z.string().nullish(),
    path: z.string().nullish(),
  })
  .passthrough();
type SrcEntry = z.infer<typeof SrcEntrySchema>;

const SrcListingSchema = z
  .object({
    values: z.array(SrcEntrySchema),
    next: z.string().nullish(),
  })
  .passthrough();

export type BitbucketSourceOptions = Omit<HttpClientOptions, "baseURL" | "token"> &
  RuleFileOptions & {
    baseUrl?: string;
    accessToken: string;
    workspace: string;
    repoSlug: string;
    ref: string;
    recursive?: boolean;
  };

function encodePath(p: string) {
  return p.split("/").filter(Boolean).map(encodeURIComponent).join("/");
}

/** Rule files read through the Bitbucket Cloud `src` endpoint at one ref. */
export class BitbucketRuleSource implements RuleSource {
  private readonly http: HttpClient;
  private readonly log: Logger;
  private readonly matcher: RuleFileMatcher;

  constructor(private readonly opts: BitbucketSourceOptions) {
    this.log = opts.logger;
    this.matcher = new RuleFileMatcher(opts);
    this.http = new HttpClient({
      baseURL: opts.baseUrl ?? BITBUCKET_API_BASE_URL,
      token: opts.accessToken,
      logger: opts.logger,
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
    });
  }

  describe() {
    const { workspace, repoSlug, dir, ref } = this.opts;
    return `Bitbucket ${workspace}/${repoSlug}/${dir} @ ${ref}`;
  }

  srcUrl(repoPath: string) {
    const { workspace, repoSlug, ref } = this.opts;
    const tail = encodePath(repoPath);
    return `repositories/${encodeURIComponent(workspace)}/${encodeURIComponent(repoSlug)}/src/${encodePath(ref)}/${tail}`;
  }

  async listRuleCandidates(): Promise<RuleCandidate[] | null> {
    this.log.info(`Fetching rule files from ${this.describe()}`);
    const candidates: RuleCandidate[] = [];
    const ok = await this.collect(this.opts.dir, candidates);
    if (!ok) return null;
    this.log.info(`Finished fetching files from Bitbucket. Found ${candidates.length} rule files.`);
    return candidates;
  }

  // Depth-first in listing order; false when any listing page fails.
  private async collect(dir: string, out: RuleCandidate[]): Promise<boolean> {
    const pages = paginate<SrcEntry>(async (cursor) => {
      const url = cursor ?? this.srcUrl(dir);
      this.log.debug(`Fetching file list page: ${url}`);
      const res = await this.http.requestJson({ method: "GET", url }, SrcListingSchema);
      if (!res.ok) return res;
      return { ...res, data: { items: res.data.values, next: res.data.next } };
    });

    try {
      for await (const { items } of pages) {
        for (const entry of items) {
          if (!entry.path) {
            this.log.warn(`Skipping listing entry without a path in ${dir} (type: ${entry.type ?? "unknown"}).`);
            continue;
          }
          if (entry.type === "commit_directory") {
            if (this.opts.recursive && !(await this.collect(entry.path, out))) return false;
            continue;
          }
          if (entry.type !== "commit_file" || !this.matcher.matches(entry.path)) continue;
          this.log.info(`Found rule file: ${entry.path}`);
          const candidate = await this.fetchCandidate(entry.path);
          if (candidate) out.push(candidate);
        }
      }
    } catch (e) {
      if (!(e instanceof PageError)) throw e;
      this.log.error(
        `Failed to list files in Bitbucket directory: ${dir} (page ${e.page}). Check path, permissions, and branch/commit.`,
      );
      return false;
    }
    return true;
  }

  private async fetchCandidate(repoPath: string): Promise<RuleCandidate | null> {
    const res = await this.http.requestBytes({ method: "GET", url: this.srcUrl(repoPath) });
    if (!res.ok) {
      this.log.error(`Failed to fetch content for rule file: ${repoPath}`);
      return null;
    }
    return toCandidate(repoPath, res.data, this.log);
  }
}
