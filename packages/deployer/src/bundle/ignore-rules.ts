/**
 * Ignore-file rules for the application bundle.
 *
 * Glob syntax: `*` matches any run of characters including `/`, `?` one
 * character, `[...]` a character class (`[!...]` negated).
 */

export interface IgnoreRules {
  exclusions: string[];
  /** `!`-prefixed lines, without the prefix */
  negations: string[];
}

export function parseIgnoreRules(content: string): IgnoreRules {
  const rules: IgnoreRules = { exclusions: [], negations: [] };
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    if (line.startsWith("!")) {
      rules.negations.push(line.slice(1));
    } else {
      rules.exclusions.push(line);
    }
  }
  return rules;
}

const REGEX_SPECIAL = /[\\^$.|+(){}]/;

function translate(pattern: string): string {
  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    i++;
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      let start = i;
      if (pattern[start] === "!") start++;
      if (pattern[start] === "]") start++;
      const close = pattern.indexOf("]", start);
      if (close === -1) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i, close).replace(/\\/g, "\\\\");
      i = close + 1;
      if (body.startsWith("!")) {
        body = "^" + body.slice(1);
      } else if (body.startsWith("^")) {
        body = "\\" + body;
      }
      source += `[${body}]`;
    } else {
      source += REGEX_SPECIAL.test(char) || char === "]" ? `\\${char}` : char;
    }
  }
  return source;
}

/**
 * Match a whole name against a glob pattern.
 */
export function globMatch(name: string, pattern: string): boolean {
  return new RegExp(`^${translate(pattern)}$`, "s").test(name);
}

function matchesExclusion(relativePath: string, rawPattern: string): boolean {
  const pattern = rawPattern.endsWith("/") ? `${rawPattern}**` : rawPattern;

  // A bare name matches any single segment of a nested path
  if (!pattern.includes("/") && relativePath.includes("/")) {
    return relativePath.split("/").some((segment) => globMatch(segment, pattern));
  }
  if (globMatch(relativePath, pattern)) {
    return true;
  }
  if (pattern.includes("**")) {
    const [head, tail] = pattern.split("**");
    return (
      (pattern.startsWith("**") && relativePath.endsWith(tail)) ||
      (pattern.endsWith("**") && relativePath.startsWith(head))
    );
  }
  return false;
}

/**
 * Whether a `/`-separated path relative to the project root is left out of the bundle.
 *
 * The first matching exclusion marks the file; a matching negation then
 * brings it back. The ignore file itself is always left out.
 */
export function isExcluded(relativePath: string, rules: IgnoreRules, ignoreFileName: string): boolean {
  if (relativePath === ignoreFileName) {
    return true;
  }

  const excluded = rules.exclusions.some((pattern) => matchesExclusion(relativePath, pattern));
  if (!excluded) {
    return false;
  }
  return !rules.negations.some((pattern) => globMatch(relativePath, pattern));
}
