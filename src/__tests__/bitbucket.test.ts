import { describe, it, expect } from "vitest";
import { BitbucketRuleSource } from "../bitbucket.js";
import { memoryLogger, routes, type FakeReply } from "./helpers.js";

const BASE = "https://bb.test/2.0";
const SRC = `${BASE}/repositories/acme/detections/src/main`;

function source(table: Record<string, FakeReply>, extra: { exclude?: string[]; recursive?: boolean; ref?: string } = {}) {
  const { adapter, calls } = routes(table);
  const log = memoryLogger();
  const src = new BitbucketRuleSource({
    baseUrl: BASE,
    accessToken: "test-bitbucket-token",
    workspace: "acme",
    repoSlug: "detections",
    ref: extra.ref ?? "main",
    dir: "rules",
    extension: ".yaral",
    exclude: extra.exclude ?? [],
    recursive: extra.recursive,
    logger: log.logger,
    adapter,
  });
  return { src, calls, log };
}

const file = (path: string) => ({ type: "commit_file", path });
const folder = (path: string) => ({ type: "commit_directory", path });

describe("BitbucketRuleSource.listRuleCandidates", () => {
  it("keeps rule files in listing order and names them by base name", async () => {
    const { src, calls } = source({
      [`GET ${SRC}/rules`]: {
        body: {
          values: [file("rules/zeta.yaral"), file("rules/README.md"), folder("rules/drafts"), file("rules/alpha.yaral")],
        },
      },
      [`GET ${SRC}/rules/zeta.yaral`]: { body: "rule zeta { }\n" },
      [`GET ${SRC}/rules/alpha.yaral`]: { body: "rule alpha { }\n" },
    });

    const candidates = await src.listRuleCandidates();

    expect(candidates).toEqual([
      { name: "zeta", text: "rule zeta { }\n", sourcePath: "rules/zeta.yaral" },
      { name: "alpha", text: "rule alpha { }\n", sourcePath: "rules/alpha.yaral" },
    ]);
    expect(calls.map(c => c.url)).toEqual([`${SRC}/rules`, `${SRC}/rules/zeta.yaral`, `${SRC}/rules/alpha.yaral`]);
    expect(calls[0].authorization).toBe("Bearer test-bitbucket-token");
  });

  it("follows the next link across pages", async () => {
    const { src } = source({
      [`GET ${SRC}/rules`]: { body: { values: [file("rules/a.yaral")], next: `${SRC}/rules?page=2` } },
      [`GET ${SRC}/rules?page=2`]: { body: { values: [file("rules/b.yaral")], next: `${SRC}/rules?page=3` } },
      [`GET ${SRC}/rules?page=3`]: { body: { values: [file("rules/c.yaral")] } },
      [`GET ${SRC}/rules/a.yaral`]: { body: "a" },
      [`GET ${SRC}/rules/b.yaral`]: { body: "b" },
      [`GET ${SRC}/rules/c.yaral`]: { body: "c" },
    });

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.name)).toEqual(["a", "b", "c"]);
  });

  it("skips empty and non-UTF-8 files without aborting", async () => {
    const { src, log } = source({
      [`GET ${SRC}/rules`]: {
        body: { values: [file("rules/empty.yaral"), file("rules/binary.yaral"), file("rules/good.yaral")] },
      },
      [`GET ${SRC}/rules/empty.yaral`]: { body: "  \n\t" },
      [`GET ${SRC}/rules/binary.yaral`]: { body: Buffer.from([0xc3, 0x28, 0xff]) },
      [`GET ${SRC}/rules/good.yaral`]: { body: "rule good { }" },
    });

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.name)).toEqual(["good"]);
    expect(log.messages("warn")).toEqual(["Rule file 'rules/empty.yaral' is empty. Skipping."]);
    expect(log.messages("error")).toEqual(["Could not decode content of file 'rules/binary.yaral' as UTF-8. Skipping."]);
  });

  it("skips a file whose content cannot be fetched", async () => {
    const { src, log } = source({
      [`GET ${SRC}/rules`]: { body: { values: [file("rules/gone.yaral"), file("rules/kept.yaral")] } },
      [`GET ${SRC}/rules/kept.yaral`]: { body: "rule kept { }" },
    });

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.name)).toEqual(["kept"]);
    expect(log.messages("error")).toContain("Failed to fetch content for rule file: rules/gone.yaral");
  });

  it("returns null when the first listing page fails", async () => {
    const { src } = source({ [`GET ${SRC}/rules`]: { status: 404, body: { type: "error" } } });
    expect(await src.listRuleCandidates()).toBeNull();
  });

  it("returns null when a later listing page fails", async () => {
    const { src, log } = source({
      [`GET ${SRC}/rules`]: { body: { values: [file("rules/a.yaral")], next: `${SRC}/rules?page=2` } },
      [`GET ${SRC}/rules/a.yaral`]: { body: "a" },
      [`GET ${SRC}/rules?page=2`]: { status: 500, body: "oops" },
    });

    expect(await src.listRuleCandidates()).toBeNull();
    expect(log.messages("error")).toContain(
      "Failed to list files in Bitbucket directory: rules (page 2). Check path, permissions, and branch/commit.",
    );
  });

  it("skips entries without a path and stops at a null next link", async () => {
    const { src, calls, log } = source({
      [`GET ${SRC}/rules`]: {
        body: { values: [{ type: "commit_file", path: null }, { type: "commit_file" }, file("rules/a.yaral")], next: null },
      },
      [`GET ${SRC}/rules/a.yaral`]: { body: "a" },
    });

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.name)).toEqual(["a"]);
    expect(calls).toHaveLength(2);
    expect(log.messages("warn")).toEqual([
      "Skipping listing entry without a path in rules (type: commit_file).",
      "Skipping listing entry without a path in rules (type: commit_file).",
    ]);
  });

  it("treats a page without values as a listing failure", async () => {
    const { src } = source({ [`GET ${SRC}/rules`]: { body: { size: 0 } } });
    expect(await src.listRuleCandidates()).toBeNull();
  });

  it("applies exclude globs relative to the rules directory", async () => {
    const { src, calls } = source(
      {
        [`GET ${SRC}/rules`]: { body: { values: [file("rules/keep.yaral"), file("rules/wip_beacon.yaral")] } },
        [`GET ${SRC}/rules/keep.yaral`]: { body: "keep" },
      },
      { exclude: ["wip_*"] },
    );

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.name)).toEqual(["keep"]);
    expect(calls.map(c => c.url)).not.toContain(`${SRC}/rules/wip_beacon.yaral`);
  });

  it("descends into directories depth-first when recursive", async () => {
    const { src } = source(
      {
        [`GET ${SRC}/rules`]: { body: { values: [file("rules/a.yaral"), folder("rules/net"), file("rules/z.yaral")] } },
        [`GET ${SRC}/rules/net`]: { body: { values: [file("rules/net/beacon.yaral")] } },
        [`GET ${SRC}/rules/a.yaral`]: { body: "a" },
        [`GET ${SRC}/rules/net/beacon.yaral`]: { body: "beacon" },
        [`GET ${SRC}/rules/z.yaral`]: { body: "z" },
      },
      { recursive: true },
    );

    const candidates = await src.listRuleCandidates();

    expect(candidates?.map(c => c.sourcePath)).toEqual(["rules/a.yaral", "rules/net/beacon.yaral", "rules/z.yaral"]);
  });

  it("encodes the ref segment by segment", () => {
    const { src } = source({}, { ref: "feature/new rules" });
    expect(src.srcUrl("rules/a b.yaral")).toBe("repositories/acme/detections/src/feature/new%20rules/rules/a%20b.yaral");
  });
});
