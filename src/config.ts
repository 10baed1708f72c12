import path from 'path';
import { ConfigError } from './errors';

const DEFAULT_DB_PATH = path.join(__dirname, '../data/jobs.db');
const DEFAULT_REPORT_DIR = path.join(__dirname, '../reports');

export interface ScoringConfig {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  maxTokens: number;
}

export interface AppConfig {
  databasePath: string;
  tableName: string;
  extractionWorkers: number;
  enrichmentWorkers: number;
  candidateProfile: string;
  scoringRubric: string;
  scoring: ScoringConfig;
  headless: boolean;
  chromiumPath: string | undefined;
  reportDir: string;
  minAnalysisLength: number;
  maxBotBlocks: number;
  port: number;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 1): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${env[key]}"`);
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key];
  return raw && raw.trim() !== '' ? raw : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tableName = readString(env, 'TABLE_NAME', 'job_offers');
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
    throw new ConfigError(`TABLE_NAME must be a plain SQL identifier, got "${tableName}"`);
  }

  // DB_PATH may name either the database file or the directory holding jobs.db
  let databasePath = readString(env, 'DB_PATH', DEFAULT_DB_PATH);
  if (databasePath !== ':memory:' && !databasePath.endsWith('.db')) {
    databasePath = path.join(databasePath, 'jobs.db');
  }

  return {
    databasePath,
    tableName,
    extractionWorkers: readInt(env, 'EXTRACTION_WORKERS', 15),
    enrichmentWorkers: readInt(env, 'ENRICHMENT_WORKERS', 10),
    candidateProfile: readString(env, 'PROFILE', ''),
    scoringRubric: readString(env, 'EXPECTATIONS', ''),
    scoring: {
      apiKey: env.SCORING_API_KEY || env.DEEPSEEK_API || undefined,
      baseUrl: readString(env, 'SCORING_BASE_URL', 'https://api.deepseek.com'),
      model: readString(env, 'SCORING_MODEL', 'deepseek-reasoner'),
      maxTokens: readInt(env, 'SCORING_MAX_TOKENS', 10000),
    },
    headless: readBool(env, 'HEADLESS', true),
    chromiumPath: env.CHROMIUM_PATH || undefined,
    reportDir: readString(env, 'REPORT_DIR', DEFAULT_REPORT_DIR),
    minAnalysisLength: readInt(env, 'MIN_ANALYSIS_LENGTH', 40, 0),
    maxBotBlocks: readInt(env, 'MAX_BOT_BLOCKS', 2),
    port: readInt(env, 'PORT', 3001),
  };
}
