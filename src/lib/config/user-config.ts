import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

const CONFIG_DIR = path.join(os.homedir(), ".doc2ai");
const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

export interface UserConfig {
  limits?: {
    /** Per-file upload cap in megabytes */
    maxFileMb?: number;
    /** Cumulative per-session cap in megabytes */
    maxSessionMb?: number;
  };
  session?: {
    ttlMinutes?: number;
    sweepIntervalSeconds?: number;
  };
  conversion?: {
    concurrency?: number;
    /** tesseract.js language code(s), e.g. "eng" or "eng+deu" */
    ocrLanguage?: string;
    /** Needed for languages without an installed @tesseract.js-data package */
    ocrLangPath?: string;
  };
  server?: {
    port?: number;
  };
  vision?: {
    enabled?: boolean;
    /** openai, anthropic or gemini */
    provider?: string;
    model?: string;
  };
}

/**
 * Ensure config directory exists
 */
function ensureConfigDir(): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(
  source: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = source[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function pickNumber(
  source: Record<string, unknown>,
  key: string,
): number | undefined {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value > 0
    ? value
    : undefined;
}

/**
 * Keeps only the fields we understand, dropping anything of the wrong type.
 */
export function parseUserConfig(raw: unknown): UserConfig {
  if (!isRecord(raw)) return {};
  const config: UserConfig = {};

  if (isRecord(raw.limits)) {
    config.limits = {
      maxFileMb: pickNumber(raw.limits, "maxFileMb"),
      maxSessionMb: pickNumber(raw.limits, "maxSessionMb"),
    };
  }
  if (isRecord(raw.session)) {
    config.session = {
      ttlMinutes: pickNumber(raw.session, "ttlMinutes"),
      sweepIntervalSeconds: pickNumber(raw.session, "sweepIntervalSeconds"),
    };
  }
  if (isRecord(raw.conversion)) {
    config.conversion = {
      concurrency: pickNumber(raw.conversion, "concurrency"),
      ocrLanguage: pickString(raw.conversion, "ocrLanguage"),
      ocrLangPath: pickString(raw.conversion, "ocrLangPath"),
    };
  }
  if (isRecord(raw.server)) {
    config.server = { port: pickNumber(raw.server, "port") };
  }
  if (isRecord(raw.vision)) {
    const enabled = raw.vision.enabled;
    config.vision = {
      enabled: typeof enabled === "boolean" ? enabled : undefined,
      provider: pickString(raw.vision, "provider"),
      model: pickString(raw.vision, "model"),
    };
  }
  return config;
}

/**
 * Load user configuration from ~/.doc2ai/config.json
 */
export function loadUserConfig(configFile = CONFIG_FILE): UserConfig {
  try {
    if (fs.existsSync(configFile)) {
      const content = fs.readFileSync(configFile, "utf-8");
      return parseUserConfig(JSON.parse(content));
    }
  } catch (err) {
    console.warn(`[config] Ignoring unreadable ${configFile}:`, err);
  }
  return {};
}

/**
 * Save user configuration to ~/.doc2ai/config.json
 */
export function saveUserConfig(config: UserConfig): void {
  ensureConfigDir();
  const content = JSON.stringify(config, null, 2);
  fs.writeFileSync(CONFIG_FILE, content, "utf-8");
}

/**
 * Get the config file path
 */
export function getConfigFilePath(): string {
  return CONFIG_FILE;
}
