import path from "node:path";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";

/** One file in a simulated layer; `origin` records which op put it there. */
export type FileEntry = {
  digest: string;
  size: number;
  origin: string;
  meta?: Record<string, string>;
};

export type Snapshot = Readonly<Record<string, FileEntry>>;

/** Cache directory the package manager writes downloaded wheels to. */
export const PACKAGE_MANAGER_CACHE = "/root/.cache/pypoetry";

const SYSTEM_PACKAGE_FILES: Record<string, string[]> = {
  "build-essential": ["/usr/bin/gcc", "/usr/bin/g++", "/usr/bin/cc", "/usr/bin/make", "/usr/bin/ld"],
  gcc: ["/usr/bin/gcc", "/usr/bin/cc"],
  curl: ["/usr/bin/curl"],
  git: ["/usr/bin/git"],
  "libpq-dev": ["/usr/include/postgresql/libpq-fe.h"],
};

export function isUnder(filePath: string, dir: string): boolean {
  const rel = path.posix.relative(dir, filePath);
  return rel !== "" && !rel.startsWith("..") && !path.posix.isAbsolute(rel);
}

export function syntheticEntry(filePath: string, origin: string, content: string, meta?: Record<string, string>): FileEntry {
  return {
    digest: computeSha256FromContent(`${filePath}\n${content}`),
    size: Buffer.byteLength(content),
    origin,
    ...(meta ? { meta } : {}),
  };
}

export function withFiles(snapshot: Snapshot, files: Record<string, FileEntry>): Snapshot {
  return Object.freeze({ ...snapshot, ...files });
}

export function withoutDirs(snapshot: Snapshot, dirs: string[]): Snapshot {
  const result: Record<string, FileEntry> = {};
  for (const [p, entry] of Object.entries(snapshot)) {
    if (!dirs.some((d) => isUnder(p, d))) result[p] = entry;
  }
  return Object.freeze(result);
}

export function filesUnder(snapshot: Snapshot, dir: string): Record<string, FileEntry> {
  const result: Record<string, FileEntry> = {};
  for (const [p, entry] of Object.entries(snapshot)) {
    if (isUnder(p, dir)) result[p] = entry;
  }
  return result;
}

/** Files of a slim Python base image, enough to model what stages add on top. */
export function baseImageSnapshot(image: string, pythonVersion: string): Snapshot {
  const files = [
    "/bin/sh",
    "/usr/bin/apt-get",
    "/etc/os-release",
    "/usr/local/bin/python",
    "/usr/local/bin/python3",
    "/usr/local/bin/pip",
    `/usr/local/lib/python${pythonVersion}/os.py`,
  ];
  return Object.freeze(Object.fromEntries(files.map((f) => [f, syntheticEntry(f, "base-image", image)])));
}

/** Files an apt package installs; unknown packages get a single binary named after them. */
export function systemPackageFiles(pkg: string): string[] {
  return SYSTEM_PACKAGE_FILES[pkg] ?? [`/usr/bin/${pkg}`];
}
