export type RuleName = string;

export type RuleCandidate = {
  readonly name: RuleName;
  readonly text: string;
  // path inside the repository (or the working copy), as listed by the source
  readonly sourcePath: string;
};

export type RuleResult = "skipped" | "uploaded" | "failed-verification" | "failed-upload" | "planned";

export type RuleOutcome = {
  name: RuleName;
  sourcePath: string;
  result: RuleResult;
};

export type RunSummary = {
  processed: number;
  skipped: number;
  uploaded: number;
  failedVerification: number;
  failedUpload: number;
  // dry-run only: rules that would have been verified and uploaded
  planned: number;
};

export type SyncOutcome = {
  status: "completed" | "aborted";
  abortedAt?: "remote" | "repository";
  summary: RunSummary;
  outcomes: RuleOutcome[];
  finalRuleCount?: number;
  exitCode: 0 | 1;
};

/** Rules already registered in the analytics service. */
export interface RuleDirectory {
  listRuleNames(): Promise<Set<RuleName> | null>;
  countRules(): Promise<number | null>;
  verify(name: RuleName, text: string): Promise<boolean>;
  upload(name: RuleName, text: string): Promise<boolean>;
}

/** Where rule files come from: the repository host API or a working copy. */
export interface RuleSource {
  describe(): string;
  listRuleCandidates(): Promise<RuleCandidate[] | null>;
}

export function emptySummary(): RunSummary {
  return { processed: 0, skipped: 0, uploaded: 0, failedVerification: 0, failedUpload: 0, planned: 0 };
}
