import type { AxiosAdapter } from "axios";
import { ChronicleRuleDirectory } from "./chronicle.js";
import { BitbucketRuleSource } from "./bitbucket.js";
import { LocalRuleSource } from "./local-source.js";
import type { SyncConfig } from "./config.js";
import type { Logger } from "./log.js";
import type { RuleDirectory, RuleSource } from "./types.js";

export function createRuleDirectory(config: SyncConfig, logger: Logger, adapter?: AxiosAdapter): RuleDirectory {
  return new ChronicleRuleDirectory({
    baseUrl: config.chronicle.baseUrl,
    accessToken: config.chronicle.accessToken,
    verifyPath: config.chronicle.verifyPath,
    timeoutMs: config.timeoutMs,
    logger,
    adapter,
  });
}

export function createRuleSource(config: SyncConfig, logger: Logger, adapter?: AxiosAdapter): RuleSource {
  const { source, rules } = config;
  if (source.kind === "local") {
    return new LocalRuleSource({ root: source.root, ...rules, logger });
  }
  return new BitbucketRuleSource({
    baseUrl: source.baseUrl,
    accessToken: source.accessToken,
    workspace: source.workspace,
    repoSlug: source.repoSlug,
    ref: source.ref,
    ...rules,
    timeoutMs: config.timeoutMs,
    logger,
    adapter,
  });
}

export { runSync, type SyncDeps, type SyncOptions } from "./sync.js";
export { buildConfig, readSettingsFile, resolveSettingsPath, ConfigError, type SyncConfig, type Settings } from "./config.js";
export { ChronicleRuleDirectory } from "./chronicle.js";
export { BitbucketRuleSource } from "./bitbucket.js";
export { LocalRuleSource } from "./local-source.js";
export { createLogger, type Logger, type LogLevel } from "./log.js";
export { formatSummary, toJsonReport, type JsonReport } from "./report.js";
export type * from "./types.js";
