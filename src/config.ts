import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// From src/:       __dirname = <root>/src      → up 1
// From dist/src/:  __dirname = <root>/dist/src → up 2
const PROJECT_ROOT = path.basename(path.dirname(__dirname)) === 'dist'
  ? path.resolve(__dirname, '../..')
  : path.resolve(__dirname, '..');

export interface Config {
  // Paths
  dataDir: string;
  dbPath: string;
  lexiconPath: string;
  scoringProfilePath: string;

  // Logging
  logLevel: string;
}

function loadEnvFile(): void {
  const envPath = path.resolve(PROJECT_ROOT, '.env');

  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    // .env is optional
    return;
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

const RcFileSchema = z.record(z.unknown());

function loadRcFile(): Record<string, unknown> {
  const rcPath = path.resolve(PROJECT_ROOT, '.alignmentrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }
  const parsed = RcFileSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : {};
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const env = (envKey: string, fallback: string): string => {
    const fromRc = rc[envKey];
    return process.env[envKey] ?? (typeof fromRc === 'string' ? fromRc : fallback);
  };
  const resolvePath = (p: string): string => path.resolve(PROJECT_ROOT, p);

  const dataDir = overrides.dataDir ?? resolvePath(env('DATA_DIR', 'data'));

  return {
    dataDir,
    dbPath: overrides.dbPath ?? resolvePath(env('DB_PATH', path.join(dataDir, 'alignment.db'))),
    lexiconPath: overrides.lexiconPath ?? resolvePath(env('LEXICON_PATH', 'config/lexicons.json')),
    scoringProfilePath:
      overrides.scoringProfilePath ?? resolvePath(env('SCORING_PROFILE_PATH', 'config/scoring.json')),

    logLevel: overrides.logLevel ?? env('LOG_LEVEL', 'info'),
  };
}
