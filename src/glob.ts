// Glob patterns for rule paths: `**` crosses directories, `*` and `?` stay
// inside one segment. Paths are compared in POSIX form.

export type PathFilter = {
  patterns: { negate: boolean; re: RegExp }[];
};

export function globToRegExp(glob: string): RegExp {
  let re = "^";
  for (let i = 0; i < glob.length; i++) {
    const c = glob[i];
    if (c === "*" && glob[i + 1] === "*") {
      while (glob[i + 1] === "*") i++;
      if (glob[i + 1] === "/") {
        i++;
        re += "(?:.*/)?";
      } else {
        re += ".*";
      }
    } else if (c === "*") {
      re += "[^/]*";
    } else if (c === "?") {
      re += "[^/]";
    } else if ("\\.+^$()[]{}|".includes(c)) {
      re += `\\${c}`;
    } else {
      re += c;
    }
  }
  return new RegExp(`${re}$`);
}

export function toPosix(p: string) {
  return p.replace(/\\/g, "/").replace(/^\.\//, "");
}

/** Exclude list where a later `!pattern` takes a path back in. */
export function compileExcludes(globs: string[]): PathFilter {
  const patterns = globs
    .map(g => g.trim())
    .filter(Boolean)
    .map(g => (g.startsWith("!") ? { negate: true, re: globToRegExp(g.slice(1)) } : { negate: false, re: globToRegExp(g) }));
  return { patterns };
}

export function isExcluded(relPath: string, filter: PathFilter): boolean {
  const p = toPosix(relPath);
  let excluded = false;
  for (const { negate, re } of filter.patterns) {
    if (re.test(p)) excluded = !negate;
  }
  return excluded;
}
