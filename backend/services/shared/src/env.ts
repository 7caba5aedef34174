// backend/services/shared/src/env.ts
/**
 * Purpose:
 * - Deterministic environment loading for every service with strict precedence:
 *   repo root → service family → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:    env.dev → .env.dev → .env
 *   docker: env.docker → .env.docker → .env
 *   prod:   .env (optional; prefer injected env)
 *
 * Notes:
 * - Only env cascade + validators live here. Boot policy is in each service's
 *   bootstrap.ts.
 * - Files are merged in order, then expanded. Variables already present in
 *   process.env are never overridden.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Walk up to the top-most directory holding a .git or package.json. */
function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    const hasGit = fs.existsSync(path.join(dir, ".git"));
    const hasPkg = fs.existsSync(path.join(dir, "package.json"));
    if (hasGit || hasPkg) lastHit = dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", "..");
}

function readIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  return dotenv.parse(fs.readFileSync(absPath));
}

export function envFileNamesFor(mode: string): string[] {
  if (mode === "dev") return ["env.dev", ".env.dev", ".env"];
  if (mode === "docker") return ["env.docker", ".env.docker", ".env"];
  return [".env"];
}

/**
 * Cascading loader for a service. Returns the files that were loaded.
 * Dev/docker must load something; production may rely on injected env.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode) throw new Error("NODE_ENV is required (dev | docker | production).");

  const servicePath = path.resolve(serviceRootAbs);
  const serviceRoot = fs.existsSync(path.join(servicePath, "src"))
    ? servicePath
    : path.dirname(servicePath);
  const familyDir = path.resolve(serviceRoot, "..");
  const repoRoot = findRepoRoot(serviceRoot);

  const candidates: string[] = [];
  for (const dir of [repoRoot, familyDir, serviceRoot]) {
    for (const name of envFileNamesFor(mode)) candidates.push(path.join(dir, name));
  }

  const loaded: string[] = [];
  let merged: Record<string, string> = {};
  for (const p of candidates) {
    const parsed = readIfExists(p);
    if (!parsed) continue;
    merged = { ...merged, ...parsed };
    loaded.push(p);
  }
  const expanded = dotenvExpand.expand({ parsed: merged });
  if (expanded.error) {
    throw new Error(`Failed to expand env files: ${String(expanded.error)}`);
  }

  if (!loaded.length && mode !== "production") {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

export function assertEnv(keys: string[], env: NodeJS.ProcessEnv = process.env): void {
  const missing = keys.filter((k) => !env[k] || !String(env[k]).trim());
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}
