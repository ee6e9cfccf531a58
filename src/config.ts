import * as os from "node:os";
import * as path from "node:path";
import { loadUserConfig } from "./lib/config/user-config";

const MB = 1024 * 1024;

const userConfig = loadUserConfig();

function flagFromEnv(name: string): boolean | undefined {
  const value = process.env[name];
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  return undefined;
}

function fromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

const DEFAULT_CONCURRENCY = (() => {
  const cores = os.cpus().length || 1;
  const HARD_CAP = 4;
  return Math.max(1, Math.min(HARD_CAP, cores));
})();

export const CONFIG = {
  MAX_FILE_BYTES:
    (fromEnv("DOC2AI_MAX_FILE_MB") ?? userConfig.limits?.maxFileMb ?? 10) * MB,
  MAX_SESSION_BYTES:
    (fromEnv("DOC2AI_MAX_SESSION_MB") ??
      userConfig.limits?.maxSessionMb ??
      50) * MB,
  SESSION_TTL_MS:
    (fromEnv("DOC2AI_SESSION_TTL_MINUTES") ??
      userConfig.session?.ttlMinutes ??
      15) *
    60 *
    1000,
  SWEEP_INTERVAL_MS:
    (fromEnv("DOC2AI_SWEEP_INTERVAL_SECONDS") ??
      userConfig.session?.sweepIntervalSeconds ??
      60) * 1000,
  CONVERT_CONCURRENCY:
    fromEnv("DOC2AI_CONVERT_CONCURRENCY") ??
    userConfig.conversion?.concurrency ??
    DEFAULT_CONCURRENCY,
  OCR_LANGUAGE:
    process.env.DOC2AI_OCR_LANGUAGE || userConfig.conversion?.ocrLanguage || "eng",
  /** Directory of *.traineddata.gz; unset means the @tesseract.js-data package */
  OCR_LANG_PATH:
    process.env.DOC2AI_OCR_LANG_PATH || userConfig.conversion?.ocrLangPath,
  VISION_ENABLED:
    flagFromEnv("DOC2AI_VISION_ENABLED") ?? userConfig.vision?.enabled ?? false,
  VISION_PROVIDER:
    process.env.DOC2AI_VISION_PROVIDER || userConfig.vision?.provider || "openai",
  VISION_MODEL: process.env.DOC2AI_VISION_MODEL || userConfig.vision?.model,
  PREVIEW_CHARS: 2000,
  PORT: fromEnv("DOC2AI_PORT") ?? userConfig.server?.port ?? 8000,
};

export const DEBUG = process.env.DOC2AI_DEBUG === "1";

const HOME = os.homedir();
const GLOBAL_ROOT = path.join(HOME, ".doc2ai");

export const PATHS = {
  globalRoot: GLOBAL_ROOT,
  configFile: path.join(GLOBAL_ROOT, "config.json"),
};
