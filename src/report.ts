import type { RunSummary, SyncOutcome } from "./types.js";

export function formatSummary(s: RunSummary, dryRun = false): string[] {
  const lines = [
    `Rule files processed: ${s.processed}`,
    `Rules skipped (matching ruleName found in Chronicle): ${s.skipped}`,
  ];
  if (dryRun) {
    lines.push(`Rules that would be verified and uploaded: ${s.planned}`);
    return lines;
  }
  lines.push(`Rules successfully verified and uploaded: ${s.uploaded}`);
  lines.push(`Rules failed verification: ${s.failedVerification}`);
  lines.push(`Rules failed upload (after verification): ${s.failedUpload}`);
  return lines;
}

export type JsonReport = {
  source: string;
  dryRun: boolean;
  status: SyncOutcome["status"];
  abortedAt: SyncOutcome["abortedAt"] | null;
  summary: RunSummary;
  rules: SyncOutcome["outcomes"];
  finalRuleCount: number | null;
  exitCode: number;
};

export function toJsonReport(outcome: SyncOutcome, meta: { source: string; dryRun: boolean }): JsonReport {
  return {
    source: meta.source,
    dryRun: meta.dryRun,
    status: outcome.status,
    abortedAt: outcome.abortedAt ?? null,
    summary: { ...outcome.summary },
    rules: outcome.outcomes.map(o => ({ ...o })),
    finalRuleCount: outcome.finalRuleCount ?? null,
    exitCode: outcome.exitCode,
  };
}
