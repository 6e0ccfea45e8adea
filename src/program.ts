import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import type { AxiosAdapter } from "axios";
import { Command } from "commander";
import { buildConfig, ConfigError, readSettingsFile, resolveSettingsPath, type Settings, type SyncConfig } from "./config.js";
import { createLogger, type Logger } from "./log.js";
import { createRuleDirectory, createRuleSource } from "./index.js";
import { runSync } from "./sync.js";
import { toJsonReport } from "./report.js";

// Resolve package version without JSON import attributes
function packageVersion() {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") return pkg.version;
  } catch {
    // running from an unpacked tree without package.json; keep the placeholder
  }
  return "0.0.0";
}

/** Everything the commands touch outside the process. */
export type CliIO = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  adapter?: AxiosAdapter;
};

export function processIO(): CliIO {
  return {
    env: process.env,
    cwd: process.cwd(),
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

type SourceFlags = {
  config?: string;
  ref?: string;
  dir?: string;
  ext?: string;
  exclude?: string[];
  recursive?: boolean;
  local?: string;
  verbose?: boolean;
};

type SyncFlags = SourceFlags & {
  dryRun?: boolean;
  finalCount: boolean;
  json?: boolean;
};

async function loadRuntime(
  io: CliIO,
  flags: SourceFlags,
  opts: { stderrOnly?: boolean } = {},
): Promise<{ config: SyncConfig; logger: Logger }> {
  const settingsPath = resolveSettingsPath(flags.config, io.env, io.cwd);
  const file = settingsPath ? await readSettingsFile(settingsPath) : undefined;
  const overrides: Settings = {
    ref: flags.ref,
    rulesDir: flags.dir,
    extension: flags.ext,
    exclude: flags.exclude,
    recursive: flags.recursive ? true : undefined,
    localRoot: flags.local,
    logLevel: flags.verbose ? "debug" : undefined,
  };
  const config = buildConfig({ env: io.env, file, overrides, cwd: io.cwd });
  const logger = createLogger({
    level: config.logLevel,
    stderrOnly: opts.stderrOnly,
    sink: { log: io.out, error: io.err },
  });
  if (settingsPath) logger.debug(`Settings file: ${settingsPath}`);
  return { config, logger };
}

function reportFailure(io: CliIO, command: string, e: unknown) {
  if (e instanceof ConfigError) io.err(`✖ configuration error:\n${e.message}`);
  else io.err(`✖ ${command} failed: ${e instanceof Error ? e.message : String(e)}`);
  io.setExitCode(1);
}

function sourceOptions(cmd: Command) {
  return cmd
    .option("-c, --config <file>", "YAML settings file (default: ./rule-sync.config.yml)")
    .option("--ref <ref>", "branch or commit to read rules from")
    .option("--dir <dir>", "rules directory inside the repository")
    .option("--ext <ext>", "rule file extension")
    .option("--exclude <glob...>", "exclude rule paths (relative to the rules directory)")
    .option("--recursive", "descend into sub-directories of the rules directory")
    .option("--local <root>", "read rules from a working copy instead of the Bitbucket API")
    .option("-v, --verbose", "debug logging");
}

export function buildProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name("rule-sync")
    .description("Deploy new detection rules from a Bitbucket repository to Chronicle")
    .version(packageVersion());

  sourceOptions(
    program
      .command("sync", { isDefault: true })
      .description("Verify and upload every repository rule not yet registered in Chronicle"),
  )
    .option("--dry-run", "list what would be uploaded without verifying or uploading")
    .option("--no-final-count", "skip re-listing Chronicle rules after the run")
    .option("--json", "print a JSON report on stdout (logs go to stderr)")
    .action(async (flags: SyncFlags) => {
      try {
        const { config, logger } = await loadRuntime(io, flags, { stderrOnly: flags.json });
        const source = createRuleSource(config, logger, io.adapter);
        const outcome = await runSync(
          { directory: createRuleDirectory(config, logger, io.adapter), source, logger },
          { dryRun: flags.dryRun, finalCount: flags.finalCount },
        );
        if (flags.json) {
          const report = toJsonReport(outcome, { source: source.describe(), dryRun: flags.dryRun ?? false });
          io.out(JSON.stringify(report, null, 2));
        }
        io.setExitCode(outcome.exitCode);
      } catch (e) {
        reportFailure(io, "sync", e);
      }
    });

  program
    .command("remote")
    .description("Print the rule names registered in Chronicle")
    .option("-c, --config <file>", "YAML settings file (default: ./rule-sync.config.yml)")
    .option("-v, --verbose", "debug logging")
    .action(async (flags: SourceFlags) => {
      try {
        const { config, logger } = await loadRuntime(io, flags, { stderrOnly: true });
        const names = await createRuleDirectory(config, logger, io.adapter).listRuleNames();
        if (names == null) {
          io.setExitCode(1);
          return;
        }
        for (const n of Array.from(names).sort()) io.out(n);
      } catch (e) {
        reportFailure(io, "remote", e);
      }
    });

  sourceOptions(
    program
      .command("candidates")
      .description("Print the rule files the repository source yields (name and path)"),
  ).action(async (flags: SourceFlags) => {
    try {
      const { config, logger } = await loadRuntime(io, flags, { stderrOnly: true });
      const candidates = await createRuleSource(config, logger, io.adapter).listRuleCandidates();
      if (candidates == null) {
        io.setExitCode(1);
        return;
      }
      for (const c of candidates) io.out(`${c.name}\t${c.sourcePath}`);
    } catch (e) {
      reportFailure(io, "candidates", e);
    }
  });

  return program;
}
