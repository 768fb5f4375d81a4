import fs from "node:fs";

export type BuildIdParts = {
  project: string;
  depkey: string;
  date: string;
  seq: string;
};

const BUILD_ID_RE = /^(.+)-([0-9a-f]{7})-(\d{8})-(\d{3,})$/;

/**
 * Generate a build ID.
 * Format: {project}-{depkey_7}-{YYYYMMDD}-{seq}
 */
export function generateBuildId(project: string, dependencyCacheKey: string, buildsDir: string, now = new Date()): string {
  const safeProject = project.replace(/[^a-zA-Z0-9_-]/g, "-").slice(0, 30);
  const key7 = dependencyCacheKey.slice(0, 7);
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const seq = getNextSeq(buildsDir, `${safeProject}-${key7}-${date}-`);
  return `${safeProject}-${key7}-${date}-${seq}`;
}

export function parseBuildId(id: string): BuildIdParts | null {
  const m = BUILD_ID_RE.exec(id);
  if (!m) return null;
  return { project: m[1], depkey: m[2], date: m[3], seq: m[4] };
}

function getNextSeq(buildsDir: string, prefix: string): string {
  if (!fs.existsSync(buildsDir)) return "001";

  let maxSeq = 0;
  for (const entry of fs.readdirSync(buildsDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || !entry.name.startsWith(prefix)) continue;
    const num = parseInt(entry.name.slice(prefix.length), 10);
    if (!isNaN(num) && num > maxSeq) maxSeq = num;
  }

  return String(maxSeq + 1).padStart(3, "0");
}
