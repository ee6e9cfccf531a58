import * as fs from "node:fs";
import * as path from "node:path";
import { Command } from "commander";
import { isOutputFormat } from "../lib/convert/types";
import { describeCause } from "../lib/errors";
import { ConversionService } from "../lib/service";
import {
  createConversionSpinner,
  formatConversionSummary,
} from "../lib/utils/progress";

export const convert = new Command("convert")
  .description("Convert local files to Markdown or JSON")
  .argument("<files...>", "Files to convert")
  .option("-f, --format <format>", "Output format for every file (markdown|json)")
  .option("-o, --out <dir>", "Directory to write outputs to", ".")
  .option("--zip <name>", "Also bundle every output into a ZIP archive")
  .action(async (files: string[], _opts, cmd) => {
    const options: { format?: string; out: string; zip?: string } =
      cmd.optsWithGlobals();

    if (options.format !== undefined && !isOutputFormat(options.format)) {
      console.error(`Unknown format '${options.format}'. Use markdown or json.`);
      process.exitCode = 1;
      return;
    }

    const service = new ConversionService();
    const outDir = path.resolve(options.out);
    const { spinner, onUploaded } = createConversionSpinner("Uploading...");
    let failures = 0;

    try {
      const { sessionId } = await service.createOrResumeSession();

      for (const [i, file] of files.entries()) {
        const filePath = path.resolve(file);
        onUploaded(filePath, i + 1, files.length);
        try {
          const bytes = fs.readFileSync(filePath);
          const info = await service.uploadFile(sessionId, path.basename(filePath), bytes);
          if (options.format) {
            await service.setOutputFormat(sessionId, info.id, options.format);
          }
        } catch (err) {
          failures += 1;
          spinner.warn(`Skipped ${file}: ${describeCause(err)}`);
          spinner.start();
        }
      }

      spinner.text = "Converting...";
      const results = await service.convertAll(sessionId);
      fs.mkdirSync(outDir, { recursive: true });

      for (const result of results) {
        if (result.status !== "converted") {
          failures += 1;
          continue;
        }
        const download = await service.downloadFile(sessionId, result.fileId);
        fs.writeFileSync(path.join(outDir, download.filename), download.body);
      }

      const converted = results.length - results.filter((r) => r.status === "error").length;
      if (options.zip && converted > 0) {
        const archive = await service.downloadArchive(sessionId);
        const zipName = options.zip.endsWith(".zip") ? options.zip : `${options.zip}.zip`;
        fs.writeFileSync(path.join(outDir, zipName), archive.body);
      }

      if (failures > 0) {
        spinner.warn(`Converted ${converted} file(s), ${failures} failed`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`Converted ${converted} file(s)`);
      }
      if (results.length > 0) {
        console.log(formatConversionSummary(results, outDir));
      }
    } catch (error) {
      spinner.fail("Conversion failed");
      console.error("Failed to convert:", describeCause(error));
      process.exitCode = 1;
    } finally {
      await service.close();
    }
  });
