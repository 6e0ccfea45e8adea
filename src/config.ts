import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import YAML from "yaml";
import { z } from "zod";
import { chronicleBaseUrl, DEFAULT_VERIFY_PATH } from "./chronicle.js";
import { BITBUCKET_API_BASE_URL } from "./bitbucket.js";
import type { LogLevel } from "./log.js";

export const SETTINGS_FILENAME = "rule-sync.config.yml";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type SyncConfig = {
  readonly chronicle: { baseUrl: string; accessToken: string; verifyPath: string };
  readonly source:
    | { kind: "bitbucket"; baseUrl: string; workspace: string; repoSlug: string; accessToken: string; ref: string }
    | { kind: "local"; root: string };
  readonly rules: { dir: string; extension: string; exclude: string[]; recursive: boolean };
  readonly timeoutMs?: number;
  readonly logLevel: LogLevel;
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

function parseBool(v: unknown) {
  if (typeof v !== "string") return v;
  const s = v.trim().toLowerCase();
  if (s === "") return undefined;
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return v;
}

function splitList(v: unknown) {
  if (typeof v !== "string") return v;
  const items = v.split(",").map(s => s.trim()).filter(Boolean);
  return items.length ? items : undefined;
}

const str = z.preprocess(blankToUndefined, z.string().trim().optional());
const url = z.preprocess(blankToUndefined, z.string().trim().url().optional());

/** Non-secret settings; shared by the YAML file, the environment and CLI flags. */
export const SettingsSchema = z
  .object({
    region: z.string().min(1),
    apiBaseUrl: z.string().url(),
    verifyPath: z.string().min(1),
    bitbucketApiBaseUrl: z.string().url(),
    workspace: z.string().min(1),
    repoSlug: z.string().min(1),
    ref: z.string().min(1),
    rulesDir: z.string(),
    extension: z.string().min(1),
    exclude: z.array(z.string()),
    recursive: z.boolean(),
    localRoot: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    logLevel: LogLevelSchema,
  })
  .partial()
  .strict();
export type Settings = z.infer<typeof SettingsSchema>;

const EnvSchema = z.object({
  CHRONICLE_ACCESS_TOKEN: str,
  CHRONICLE_REGION: str,
  CHRONICLE_API_BASE_URL: url,
  CHRONICLE_VERIFY_PATH: str,
  BITBUCKET_WORKSPACE: str,
  BITBUCKET_REPO_SLUG: str,
  BITBUCKET_ACCESS_TOKEN: str,
  BITBUCKET_API_BASE_URL: url,
  BITBUCKET_BRANCH_OR_COMMIT: str,
  RULES_DIR: z.string().optional(),
  RULE_FILE_EXTENSION: str,
  RULES_EXCLUDE: z.preprocess(splitList, z.array(z.string()).optional()),
  RULES_RECURSIVE: z.preprocess(parseBool, z.boolean().optional()),
  RULES_LOCAL_ROOT: str,
  HTTP_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  LOG_LEVEL: z.preprocess(
    v => (typeof v === "string" ? blankToUndefined(v.trim().toLowerCase()) : v),
    LogLevelSchema.optional(),
  ),
});

function describeIssues(err: z.ZodError, prefix = "") {
  return err.issues.map(i => `${prefix}${i.path.join(".") || "(root)"}: ${i.message}`).join("\n");
}

export function resolveSettingsPath(explicit: string | undefined, env: NodeJS.ProcessEnv, cwd = process.cwd()): string | null {
  if (explicit) return path.resolve(cwd, explicit);
  const fromEnv = (env.RULE_SYNC_CONFIG ?? "").trim();
  if (fromEnv) return path.resolve(cwd, fromEnv);
  const inCwd = path.resolve(cwd, SETTINGS_FILENAME);
  return fss.existsSync(inCwd) ? inCwd : null;
}

export async function readSettingsFile(filePath: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read settings file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = SettingsSchema.safeParse(doc ?? {});
  if (!parsed.success) throw new ConfigError(`Invalid settings in ${filePath}:\n${describeIssues(parsed.error, "  ")}`);
  return parsed.data;
}

function normalizeExtension(ext: string) {
  const e = ext.trim();
  return e.startsWith(".") ? e : `.${e}`;
}

/**
 * Validates everything up front; a {@link ConfigError} names every missing
 * variable so a misconfigured pipeline fails before any network call.
 * Precedence: overrides (CLI) > environment > settings file > defaults.
 */
export function buildConfig(input: {
  env: NodeJS.ProcessEnv;
  file?: Settings;
  overrides?: Settings;
  // base for a relative working-copy root
  cwd?: string;
}): SyncConfig {
  const envParsed = EnvSchema.safeParse(input.env);
  if (!envParsed.success) throw new ConfigError(`Invalid environment:\n${describeIssues(envParsed.error, "  ")}`);
  const e = envParsed.data;

  const fromEnv: Settings = {
    region: e.CHRONICLE_REGION,
    apiBaseUrl: e.CHRONICLE_API_BASE_URL,
    verifyPath: e.CHRONICLE_VERIFY_PATH,
    bitbucketApiBaseUrl: e.BITBUCKET_API_BASE_URL,
    workspace: e.BITBUCKET_WORKSPACE,
    repoSlug: e.BITBUCKET_REPO_SLUG,
    ref: e.BITBUCKET_BRANCH_OR_COMMIT,
    rulesDir: e.RULES_DIR,
    extension: e.RULE_FILE_EXTENSION,
    exclude: e.RULES_EXCLUDE,
    recursive: e.RULES_RECURSIVE,
    localRoot: e.RULES_LOCAL_ROOT,
    timeoutMs: e.HTTP_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
  const file = input.file ?? {};
  const overrides = input.overrides ?? {};
  const pick = <K extends keyof Settings>(k: K): Settings[K] => overrides[k] ?? fromEnv[k] ?? file[k];

  const problems: string[] = [];

  const chronicleToken = e.CHRONICLE_ACCESS_TOKEN;
  const region = pick("region");
  const apiBaseUrl = pick("apiBaseUrl") ?? (region ? chronicleBaseUrl(region) : undefined);
  const chronicleMissing: string[] = [];
  if (!chronicleToken) chronicleMissing.push("CHRONICLE_ACCESS_TOKEN");
  if (!apiBaseUrl) chronicleMissing.push("CHRONICLE_REGION");
  if (chronicleMissing.length) {
    problems.push(`Missing required Chronicle environment variables: ${chronicleMissing.join(", ")}`);
  }

  const localRoot = pick("localRoot");
  const workspace = pick("workspace");
  const repoSlug = pick("repoSlug");
  const bitbucketToken = e.BITBUCKET_ACCESS_TOKEN;
  let source: SyncConfig["source"] | null = null;
  if (localRoot) {
    source = { kind: "local", root: path.resolve(input.cwd ?? process.cwd(), localRoot) };
  } else if (workspace && repoSlug && bitbucketToken) {
    source = {
      kind: "bitbucket",
      baseUrl: (pick("bitbucketApiBaseUrl") ?? BITBUCKET_API_BASE_URL).replace(/\/+$/, ""),
      workspace,
      repoSlug,
      accessToken: bitbucketToken,
      ref: pick("ref") ?? "main",
    };
  } else {
    const bbMissing: string[] = [];
    if (!workspace) bbMissing.push("BITBUCKET_WORKSPACE");
    if (!repoSlug) bbMissing.push("BITBUCKET_REPO_SLUG");
    if (!bitbucketToken) bbMissing.push("BITBUCKET_ACCESS_TOKEN");
    problems.push(`Missing required Bitbucket environment variables: ${bbMissing.join(", ")}`);
  }

  if (problems.length || !source || !apiBaseUrl || !chronicleToken) throw new ConfigError(problems.join("\n"));

  return {
    chronicle: {
      baseUrl: apiBaseUrl.replace(/\/+$/, ""),
      accessToken: chronicleToken,
      verifyPath: pick("verifyPath") ?? DEFAULT_VERIFY_PATH,
    },
    source,
    rules: {
      dir: (pick("rulesDir") ?? "rules").trim().replace(/^\/+|\/+$/g, ""),
      extension: normalizeExtension(pick("extension") ?? ".yaral"),
      exclude: pick("exclude") ?? [],
      recursive: pick("recursive") ?? false,
    },
    timeoutMs: pick("timeoutMs"),
    logLevel: pick("logLevel") ?? "info",
  };
}
