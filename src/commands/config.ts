import * as fs from "node:fs";
import { Command } from "commander";
import { CONFIG, PATHS } from "../config";
import {
  getConfigFilePath,
  loadUserConfig,
  saveUserConfig,
  type UserConfig,
} from "../lib/config/user-config";
import { formatSize } from "../lib/utils/file-utils";

export const config = new Command("config")
  .description("Inspect or initialise doc2ai settings")
  .option("--show", "Show the effective configuration (default)")
  .option("--init", "Write the current effective values to the config file")
  .option("--reset", "Remove every setting from the config file")
  .action((options: { show?: boolean; init?: boolean; reset?: boolean }) => {
    if (options.reset) {
      saveUserConfig({});
      console.log(`Configuration reset: ${getConfigFilePath()}`);
      return;
    }
    if (options.init) {
      initConfig();
      return;
    }
    showConfig();
  });

function effectiveConfig(): UserConfig {
  const MB = 1024 * 1024;
  return {
    limits: {
      maxFileMb: CONFIG.MAX_FILE_BYTES / MB,
      maxSessionMb: CONFIG.MAX_SESSION_BYTES / MB,
    },
    session: {
      ttlMinutes: CONFIG.SESSION_TTL_MS / 60_000,
      sweepIntervalSeconds: CONFIG.SWEEP_INTERVAL_MS / 1000,
    },
    conversion: {
      concurrency: CONFIG.CONVERT_CONCURRENCY,
      ocrLanguage: CONFIG.OCR_LANGUAGE,
      ocrLangPath: CONFIG.OCR_LANG_PATH,
    },
    server: { port: CONFIG.PORT },
    vision: {
      enabled: CONFIG.VISION_ENABLED,
      provider: CONFIG.VISION_PROVIDER,
      model: CONFIG.VISION_MODEL,
    },
  };
}

function initConfig(): void {
  const configPath = getConfigFilePath();
  if (fs.existsSync(configPath)) {
    console.log(`Config file already exists: ${configPath}`);
    return;
  }
  saveUserConfig(effectiveConfig());
  console.log(`Wrote ${configPath}`);
}

function showConfig(): void {
  const configPath = getConfigFilePath();
  const stored = loadUserConfig(configPath);

  console.log(`\nConfiguration file: ${configPath}`);
  console.log(`  ${fs.existsSync(configPath) ? "present" : "(not created, using defaults)"}`);
  console.log(`Data directory: ${PATHS.globalRoot}\n`);

  console.log("Limits:");
  console.log(`  Per file:     ${formatSize(CONFIG.MAX_FILE_BYTES)}`);
  console.log(`  Per session:  ${formatSize(CONFIG.MAX_SESSION_BYTES)}`);
  console.log("Sessions:");
  console.log(`  TTL:          ${CONFIG.SESSION_TTL_MS / 60_000} min`);
  console.log(`  Sweep every:  ${CONFIG.SWEEP_INTERVAL_MS / 1000} s`);
  console.log("Conversion:");
  console.log(`  Concurrency:  ${CONFIG.CONVERT_CONCURRENCY}`);
  console.log(`  OCR language: ${CONFIG.OCR_LANGUAGE}`);
  console.log(`  OCR data:     ${CONFIG.OCR_LANG_PATH ?? "@tesseract.js-data package"}`);
  console.log(`  Preview:      ${CONFIG.PREVIEW_CHARS} chars`);
  console.log("Vision analysis:");
  console.log(`  Enabled:      ${CONFIG.VISION_ENABLED ? "yes" : "no"}`);
  console.log(`  Provider:     ${CONFIG.VISION_PROVIDER}`);
  console.log(`  Model:        ${CONFIG.VISION_MODEL ?? "(provider default)"}`);
  console.log("Server:");
  console.log(`  Port:         ${CONFIG.PORT}`);

  const overridden = Object.keys(process.env).filter((key) => key.startsWith("DOC2AI_"));
  if (overridden.length > 0) {
    console.log(`\nOverridden by environment: ${overridden.sort().join(", ")}`);
  }
  if (Object.keys(stored).length > 0) {
    console.log(`\nFrom file:\n${JSON.stringify(stored, null, 2)}`);
  }
}
