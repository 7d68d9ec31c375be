import path from "path";
import { config } from "dotenv";
import { ConfigurationError } from "./types";

config();

export interface ModelSettings {
  apiKey?: string;
  model: string;
  baseUrl?: string;
}

export interface Settings {
  model: ModelSettings;
  outputDir: string;
  splitPatient: boolean;
  rxnavBaseUrl: string;
  snowstormBaseUrl: string;
  snowstormBranch: string;
  icdBaseUrl: string;
  icdTokenUrl: string;
  icdRelease: string;
  icdClientId: string;
  icdClientSecret: string;
  terminologyTimeoutMs: number;
}

/** CLI-level overrides. An undefined value keeps what the environment says. */
export interface SettingsOverrides {
  model?: Partial<ModelSettings>;
  outputDir?: string;
  splitPatient?: boolean;
  snowstormBaseUrl?: string;
  icdClientId?: string;
  icdClientSecret?: string;
}

export const DEFAULT_TERMINOLOGY_TIMEOUT_MS = 30000;

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) || num <= 0 ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

function pick<T>(override: T | undefined, fallback: T): T {
  return override === undefined ? fallback : override;
}

export function loadSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Readonly<Settings> {
  const model: ModelSettings = {
    apiKey: pick(overrides.model?.apiKey, env.OPENAI_API_KEY || undefined),
    model: pick(overrides.model?.model, env.OPENAI_MODEL || "gpt-4o-mini"),
    baseUrl: pick(overrides.model?.baseUrl, env.OPENAI_BASE_URL || undefined),
  };

  return Object.freeze({
    model: Object.freeze(model),
    outputDir: path.resolve(pick(overrides.outputDir, env.OUTPUT_DIR || process.cwd())),
    splitPatient: pick(overrides.splitPatient, parseBooleanEnv(env.SPLIT_PATIENT, false)),
    rxnavBaseUrl: env.RXNAV_BASE_URL || "https://rxnav.nlm.nih.gov/REST/",
    snowstormBaseUrl: pick(overrides.snowstormBaseUrl, env.SNOWSTORM_BASE_URL || ""),
    snowstormBranch: env.SNOWSTORM_BRANCH || "MAIN",
    icdBaseUrl: env.ICD_BASE_URL || "https://id.who.int/",
    icdTokenUrl: env.ICD_TOKEN_URL || "https://icdaccessmanagement.who.int/connect/token",
    icdRelease: env.ICD_RELEASE || "2024-01",
    icdClientId: pick(overrides.icdClientId, env.ICD_CLIENT_ID || ""),
    icdClientSecret: pick(overrides.icdClientSecret, env.ICD_CLIENT_SECRET || ""),
    terminologyTimeoutMs: parseNumericEnv(env.TERMINOLOGY_TIMEOUT_MS, DEFAULT_TERMINOLOGY_TIMEOUT_MS),
  });
}

export function requireModelSettings(settings: Settings): Required<ModelSettings> {
  const { apiKey, model, baseUrl } = settings.model;
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is missing in environment.");
  }
  return { apiKey, model, baseUrl: baseUrl ?? "" };
}
