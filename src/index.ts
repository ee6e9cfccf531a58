#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { config } from "./commands/config";
import { convert } from "./commands/convert";
import { serve } from "./commands/serve";

program
  .name("doc2ai")
  .description("Convert documents, spreadsheets, slides and images into Markdown or JSON")
  .version(
    JSON.parse(
      fs.readFileSync(path.join(__dirname, "../package.json"), {
        encoding: "utf-8",
      }),
    ).version,
  );

program.addCommand(serve);
program.addCommand(convert);
program.addCommand(config);

program.parse();
