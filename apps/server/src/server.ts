// apps/server/src/server.ts
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildApp } from "./app";
import { loadDefaultConfig, resolveRepoRoot } from "./config/ssot";

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    const key = m?.[1];
    if (!key) continue;
    let val = m?.[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (process.env[key] == null) process.env[key] = val;
  }
}

function loadEnv(): void {
  // Repo root .env first, then the package-local one.
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.resolve(__dirname, "..", "..", "..", ".env"));
  loadDotEnvFile(path.resolve(__dirname, "..", ".env"));
}

loadEnv();

const repoRoot = resolveRepoRoot();
const dbPath = process.env.SCREENING_DB_PATH ?? path.join(repoRoot, "apps", "server", "data", "screening.sqlite");

const { app } = buildApp({
  dbPath,
  ssotConfig: loadDefaultConfig(repoRoot),
  logger: { level: process.env.LOG_LEVEL ?? "info" },
});

const PORT = process.env.PORT ? Number(process.env.PORT) : 3102;
const HOST = process.env.HOST ?? "0.0.0.0";

app.listen({ port: PORT, host: HOST }).catch((err: unknown) => {
  app.log.error(err);
  process.exit(1);
});
