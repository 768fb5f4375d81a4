import semver from "semver";

/**
 * Version handling for Python packages on top of semver.
 * PEP 440 local labels ("2.3.1+cpu") survive in the version string but do not take part in
 * range matching; Poetry range syntax is translated to node-semver ranges.
 */

const PEP440 =
  /^v?(\d+(?:\.\d+)*)(?:[-_.]?(a|alpha|b|beta|rc|c|pre|preview)[-_.]?(\d*))?(?:[-_.]?(?:post|rev|r)[-_.]?\d*)?(?:[-_.]?(dev)[-_.]?(\d*))?$/i;

const PRE_TAGS: Record<string, string> = { a: "a", alpha: "a", b: "b", beta: "b", rc: "rc", c: "rc", pre: "rc", preview: "rc" };

/** Split "2.3.1+cpu" into its public part and its local label. */
export function splitLocal(version: string): { public: string; local: string | null } {
  const idx = version.indexOf("+");
  if (idx === -1) return { public: version, local: null };
  return { public: version.slice(0, idx), local: version.slice(idx + 1) };
}

/**
 * Python version as a semver string, or null if it has no numeric core. The release is
 * padded or cut to three parts; "2.4.0rc1" becomes the pre-release "2.4.0-rc.1".
 */
export function toSemver(version: string): string | null {
  const pub = splitLocal(version).public.trim();
  const m = PEP440.exec(pub);
  if (!m) return semver.coerce(pub)?.version ?? null;

  const release = m[1].split(".").map(Number);
  while (release.length < 3) release.push(0);
  const pre: string[] = [];
  if (m[2]) pre.push(PRE_TAGS[m[2].toLowerCase()], m[3] || "0");
  if (m[4]) pre.push("dev", m[5] || "0");
  const core = release.slice(0, 3).join(".");
  return semver.valid(pre.length ? `${core}-${pre.join(".")}` : core);
}

/** True for a.b.c pre-releases and dev releases. */
export function isPrerelease(version: string): boolean {
  const sem = toSemver(version);
  return sem !== null && semver.prerelease(sem) !== null;
}

/** Translate a Poetry constraint ("^2.3", ">=1.0,<2.0", "==1.4.2", "!=2.3.0", "*") to a semver range. */
export function toSemverRange(constraint: string): string | null {
  const trimmed = constraint.trim();
  if (trimmed === "" || trimmed === "*") return "*";

  const alternatives = trimmed.split("||").flatMap((alt) => {
    let sets: string[][] = [[]];
    for (const raw of alt.split(",")) {
      const part = raw.trim();
      if (part === "") continue;
      if (part.startsWith("!=")) {
        // An exclusion splits every set into a below and an above branch.
        const [below, above] = excludedBounds(part.slice(2).trim());
        sets = sets.flatMap((set) => [[...set, below], [...set, above]]);
      } else {
        const comparator = translateComparator(part);
        sets = sets.map((set) => [...set, comparator]);
      }
    }
    return sets.map((set) => set.join(" ") || "*");
  });
  const range = alternatives.join(" || ");
  return semver.validRange(range) ? range : null;
}

function translateComparator(part: string): string {
  if (part.startsWith("==")) return exact(part.slice(2).trim());
  if (part.startsWith("~=")) {
    // PEP 440 compatible release: ~=1.4.2 means >=1.4.2,<1.5.0
    const v = part.slice(2).trim();
    const segments = splitLocal(v).public.split(".");
    const upper = segments.slice(0, Math.max(segments.length - 1, 1));
    upper[upper.length - 1] = String(Number.parseInt(upper[upper.length - 1], 10) + 1);
    return `>=${padVersion(v)} <${padVersion(upper.join("."))}`;
  }
  const m = /^(>=|<=|>|<|\^|~)?\s*(.+)$/.exec(part);
  if (!m) return part;
  const op = m[1] ?? "";
  if (op === "^" || op === "~") return `${op}${isPrerelease(m[2]) ? padVersion(m[2]) : splitLocal(m[2]).public}`;
  // A bare version is an exact pin.
  if (op === "") return exact(m[2]);
  return `${op}${padVersion(m[2])}`;
}

/** "2.3" → "=2.3.0"; "2.3.*" → the x-range "2.3.x". */
function exact(v: string): string {
  if (v === "*") return "*";
  if (v.endsWith(".*")) return `${v.slice(0, -2)}.x`;
  return `=${padVersion(v)}`;
}

/** Bounds either side of an excluded version or wildcard ("!=2.3.*" excludes all of 2.3). */
function excludedBounds(v: string): [below: string, above: string] {
  if (!v.endsWith(".*")) return [`<${padVersion(v)}`, `>${padVersion(v)}`];
  const segments = v.slice(0, -2).split(".");
  const next = [...segments];
  next[next.length - 1] = String(Number.parseInt(next[next.length - 1], 10) + 1);
  return [`<${padVersion(segments.join("."))}`, `>=${padVersion(next.join("."))}`];
}

function padVersion(v: string): string {
  return toSemver(v) ?? v;
}

/**
 * True when `version` falls inside the Poetry `constraint`. Pre-releases inside the range
 * match, so a lock that pins one still agrees with its manifest.
 */
export function satisfiesConstraint(version: string, constraint: string): boolean {
  const v = toSemver(version);
  const range = toSemverRange(constraint);
  if (!v || !range) return false;
  return semver.satisfies(v, range, { includePrerelease: true });
}

function namesPrerelease(constraint: string): boolean {
  return constraint
    .split(/[\s,|]+/)
    .some((token) => isPrerelease(token.replace(/^[<>=!~^]+/, "")));
}

/**
 * Highest candidate inside the constraint; ties between local variants keep the first listed.
 * Pre-releases are only candidates when the constraint itself names one.
 */
export function pickHighest(candidates: string[], constraint: string): string | null {
  const allowPrerelease = namesPrerelease(constraint);
  let best: { raw: string; sem: string } | null = null;
  for (const raw of candidates) {
    if (!allowPrerelease && isPrerelease(raw)) continue;
    if (!satisfiesConstraint(raw, constraint)) continue;
    const sem = toSemver(raw);
    if (!sem) continue;
    if (!best || semver.gt(sem, best.sem)) best = { raw, sem };
  }
  return best?.raw ?? null;
}
