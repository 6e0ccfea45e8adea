import { z } from "zod";
import { HttpClient, type HttpClientOptions } from "./http.js";
import { paginate, PageError } from "./paginate.js";
import type { Logger } from "./log.js";
import type { RuleDirectory, RuleName } from "./types.js";

export const DEFAULT_VERIFY_PATH = "detect/rules:verifyRule";
const RULES_PATH = "detect/rules";

export function chronicleBaseUrl(region: string) {
  return `https://${region}-backstory.googleapis.com/v2`;
}

// Fields may come back as null; null reads as absent.
const RemoteRuleSchema = z
  .object({
    ruleId: z.string().nullish(),
    id: z.string().nullish(),
    ruleName: z.string().nullish(),
  })
  .passthrough();
export type RemoteRule = z.infer<typeof RemoteRuleSchema>;

const ListRulesResponseSchema = z
  .object({
    rules: z.array(RemoteRuleSchema).nullish(),
    nextPageToken: z.string().nullish(),
  })
  .passthrough()
  .nullable();

const VerifyResponseSchema = z
  .object({
    success: z.boolean().nullish(),
    compilationError: z.string().nullish(),
  })
  .passthrough()
  .nullable();

const CreateRuleResponseSchema = z
  .object({
    ruleId: z.string().nullish(),
    id: z.string().nullish(),
  })
  .passthrough()
  .nullable();

export type ChronicleOptions = Omit<HttpClientOptions, "baseURL" | "token"> & {
  baseUrl: string;
  accessToken: string;
  verifyPath?: string;
};

type Listing = { rules: RemoteRule[]; complete: boolean };

/** Chronicle v2 detection-rule API: listing, syntax verification and creation. */
export class ChronicleRuleDirectory implements RuleDirectory {
  private readonly http: HttpClient;
  private readonly log: Logger;
  private readonly verifyPath: string;

  constructor(opts: ChronicleOptions) {
    this.log = opts.logger;
    this.verifyPath = (opts.verifyPath ?? DEFAULT_VERIFY_PATH).replace(/^\/+/, "");
    this.http = new HttpClient({
      baseURL: opts.baseUrl,
      token: opts.accessToken,
      logger: opts.logger,
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
    });
  }

  async listRuleNames(): Promise<Set<RuleName> | null> {
    this.log.info(`Fetching existing rules from Chronicle (${RULES_PATH})...`);
    const listing = await this.listRules();
    if (!listing) return null;

    const names = new Set<RuleName>();
    let named = 0;
    for (const rule of listing.rules) {
      if (rule.ruleName) {
        names.add(rule.ruleName);
        named++;
      } else {
        const id = rule.ruleId ?? rule.id ?? "Unknown ID";
        this.log.warn(`Chronicle rule found without a ruleName (ID: ${id}). This rule cannot be matched by filename.`);
      }
    }
    this.log.info(`Chronicle API returned ${listing.rules.length} total rules.`);
    this.log.info(`Found ${named} rules with ruleNames for matching.`);
    if (!listing.complete) {
      this.log.warn("Rule listing is incomplete: rules on unread pages will be treated as new.");
    }
    return names;
  }

  async countRules(): Promise<number | null> {
    const listing = await this.listRules();
    return listing ? listing.rules.length : null;
  }

  async verify(name: RuleName, text: string): Promise<boolean> {
    this.log.info(`Verifying rule with Chronicle using endpoint '${this.verifyPath}' (Target Name: ${name})...`);
    const res = await this.http.requestJson(
      { method: "POST", url: this.verifyPath, body: { rule_text: text } },
      VerifyResponseSchema,
    );
    if (!res.ok || res.data == null) {
      this.log.error(`Rule syntax verification for '${name}' failed with Chronicle.`);
      return false;
    }
    if (res.data.success === false) {
      const detail = res.data.compilationError ? ` Compilation error: ${res.data.compilationError}` : "";
      this.log.error(`Rule syntax verification for '${name}' failed with Chronicle.${detail}`);
      return false;
    }
    this.log.info(`Rule syntax for '${name}' verified successfully by Chronicle.`);
    return true;
  }

  async upload(name: RuleName, text: string): Promise<boolean> {
    this.log.info(`Uploading rule to Chronicle as '${name}'...`);
    const res = await this.http.requestJson(
      { method: "POST", url: RULES_PATH, body: { ruleName: name, ruleText: text } },
      CreateRuleResponseSchema,
    );
    const ruleId = res.ok ? res.data?.ruleId ?? res.data?.id : undefined;
    if (ruleId) {
      this.log.info(`Rule '${name}' uploaded successfully to Chronicle. Rule ID: ${ruleId}`);
      return true;
    }
    const detail = res.ok && res.data != null ? ` Response: ${JSON.stringify(res.data)}` : "";
    this.log.error(`Rule '${name}' upload failed with Chronicle.${detail}`);
    return false;
  }

  private async listRules(): Promise<Listing | null> {
    const rules: RemoteRule[] = [];
    const pages = paginate<RemoteRule>(async (cursor, page) => {
      this.log.debug(`Fetching page ${page} of existing rules...`);
      const res = await this.http.requestJson(
        { method: "GET", url: RULES_PATH, params: cursor ? { pageToken: cursor } : undefined },
        ListRulesResponseSchema,
      );
      if (!res.ok) return res;
      return { ...res, data: { items: res.data?.rules ?? [], next: res.data?.nextPageToken } };
    });

    try {
      for await (const { items } of pages) rules.push(...items);
    } catch (e) {
      if (!(e instanceof PageError)) throw e;
      if (e.page === 1) {
        this.log.error("Failed to retrieve initial page of rules from Chronicle.");
        return null;
      }
      this.log.error(`Failed to retrieve page ${e.page} of rules from Chronicle. Proceeding with previously fetched data.`);
      return { rules, complete: false };
    }
    return { rules, complete: true };
  }
}
