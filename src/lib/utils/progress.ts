import * as path from "node:path";
import ora, { type Ora } from "ora";
import type { ConversionResult } from "../session/types";

interface ConversionSpinner {
  spinner: Ora;
  onUploaded: (filePath: string, index: number, total: number) => void;
}

/**
 * Converts an absolute `filePath` into a path relative to the working
 * directory when it sits underneath it.
 */
function formatRelativePath(filePath: string): string {
  const cwd = process.cwd();
  return filePath.startsWith(cwd) ? path.relative(cwd, filePath) : filePath;
}

export function createConversionSpinner(text: string): ConversionSpinner {
  const spinner = ora({ text }).start();
  return {
    spinner,
    onUploaded: (filePath, index, total) => {
      spinner.text = `Uploading (${index}/${total}) • ${formatRelativePath(filePath)}`;
    },
  };
}

export function formatConversionSummary(
  results: ConversionResult[],
  outDir: string,
): string {
  const lines: string[] = [];
  for (const result of results) {
    if (result.status === "converted" && result.outputFilename) {
      lines.push(
        `  ✓ ${result.filename} → ${formatRelativePath(path.join(outDir, result.outputFilename))}`,
      );
    } else {
      lines.push(`  ✗ ${result.filename}: ${result.error ?? "conversion failed"}`);
    }
  }
  return lines.join("\n");
}
