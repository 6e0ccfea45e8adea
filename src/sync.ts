import type { Logger } from "./log.js";
import { formatSummary } from "./report.js";
import {
  emptySummary,
  type RuleDirectory,
  type RuleOutcome,
  type RuleResult,
  type RuleSource,
  type RunSummary,
  type SyncOutcome,
} from "./types.js";

export type SyncOptions = {
  // diff only: no verify/upload calls
  dryRun?: boolean;
  // re-list the directory at the end for an informational count
  finalCount?: boolean;
};

export type SyncDeps = {
  directory: RuleDirectory;
  source: RuleSource;
  logger: Logger;
};

const COUNTERS: Record<RuleResult, keyof RunSummary> = {
  skipped: "skipped",
  uploaded: "uploaded",
  "failed-verification": "failedVerification",
  "failed-upload": "failedUpload",
  planned: "planned",
};

function aborted(stage: "remote" | "repository"): SyncOutcome {
  return { status: "aborted", abortedAt: stage, summary: emptySummary(), outcomes: [], exitCode: 1 };
}

export async function runSync(deps: SyncDeps, opts: SyncOptions = {}): Promise<SyncOutcome> {
  const { directory, source, logger: log } = deps;
  const dryRun = opts.dryRun ?? false;
  log.info(`--- Starting rule deployment${dryRun ? " (dry run)" : ""} ---`);

  log.info("--- Step 1: Get Existing Rule Names ---");
  const existing = await directory.listRuleNames();
  if (existing == null) {
    log.error("Failed to get initial rule data from Chronicle. Aborting.");
    return aborted("remote");
  }
  log.info(`Using ${existing.size} ruleNames for existence checks.`);

  log.info(`--- Step 2: Fetch Rules from ${source.describe()} ---`);
  const candidates = await source.listRuleCandidates();
  if (candidates == null) {
    log.error("Failed to fetch rules from the repository. Aborting.");
    return aborted("repository");
  }
  if (candidates.length === 0) {
    log.warn(`No rule files found in ${source.describe()}. Nothing to do.`);
    return { status: "completed", summary: emptySummary(), outcomes: [], exitCode: 0 };
  }

  log.info(`--- Step 3: Verify and Upload Rules${dryRun ? " (dry run)" : ""} ---`);
  const summary = emptySummary();
  const outcomes: RuleOutcome[] = [];
  for (const c of candidates) {
    summary.processed++;
    log.info(`Processing rule from path: ${c.sourcePath} (Target ruleName: ${c.name})`);

    let result: RuleResult;
    if (existing.has(c.name)) {
      log.info(`Rule with matching ruleName '${c.name}' found in Chronicle. Skipping upload.`);
      result = "skipped";
    } else if (dryRun) {
      log.info(`Rule '${c.name}' is not registered yet and would be verified and uploaded.`);
      result = "planned";
    } else if (!(await directory.verify(c.name, c.text))) {
      result = "failed-verification";
    } else {
      result = (await directory.upload(c.name, c.text)) ? "uploaded" : "failed-upload";
    }
    summary[COUNTERS[result]]++;
    outcomes.push({ name: c.name, sourcePath: c.sourcePath, result });
  }

  log.info("--- Rule Upload Summary ---");
  for (const line of formatSummary(summary, dryRun)) log.info(line);

  let finalRuleCount: number | undefined;
  if ((opts.finalCount ?? true) && !dryRun) {
    log.info("--- Step 4: Get Final Rule Count ---");
    const count = await directory.countRules();
    if (count == null) log.warn("Could not re-list rules for the final count.");
    else {
      finalRuleCount = count;
      log.info(`Chronicle now holds ${count} rules.`);
    }
  }

  const failed = summary.failedVerification + summary.failedUpload;
  log.info(`--- Rule deployment finished${failed > 0 ? ` with ${failed} failure(s)` : ""} ---`);
  return { status: "completed", summary, outcomes, finalRuleCount, exitCode: failed > 0 ? 1 : 0 };
}
