import fs from "node:fs";
import path from "node:path";

export const TIERS = ["simple", "middle", "difficult", "malformed"] as const;

export type Tier = (typeof TIERS)[number];

export function isTier(value: string): value is Tier {
  return TIERS.some((tier) => tier === value);
}

/**
 * A rendered test file, complete in memory.
 */
export interface Artifact {
  tier: Tier;
  path: string;
  source: string;
}

export type ArtifactStatus = "fresh" | "stale" | "missing";

export function artifactPath(outDir: string, tier: Tier): string {
  return path.join(outDir, `${tier}.golden.test.ts`);
}

/**
 * Replace the artifact on disk: write a temporary file beside it, then
 * rename over the target.
 */
export function writeArtifact(artifact: Artifact): void {
  fs.mkdirSync(path.dirname(artifact.path), { recursive: true });
  const temp = `${artifact.path}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(temp, artifact.source, "utf8");
    fs.renameSync(temp, artifact.path);
  } catch (err) {
    fs.rmSync(temp, { force: true });
    throw err;
  }
}

/**
 * Compare a rendered artifact with the file on disk.
 */
export function compareArtifact(artifact: Artifact): ArtifactStatus {
  if (!fs.existsSync(artifact.path)) {
    return "missing";
  }
  return fs.readFileSync(artifact.path, "utf8") === artifact.source ? "fresh" : "stale";
}
