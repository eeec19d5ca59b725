#!/usr/bin/env npx tsx
// bin/formwork.ts
// formwork CLI: design + compile a form, run messages through the runtime, print the trace
//
// Run:  npx tsx bin/formwork.ts [options] [file]

import * as fs from "fs";
import { isFormworkError } from "../src/core/errors";
import { consoleLog } from "../src/core/log";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  runSession,
  formatReport,
  SAMPLE_FORM,
  SAMPLE_MESSAGES,
} from "./formwork-cli-lib";

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }
  if (cliArgs.version) {
    console.log(getVersion());
    return;
  }

  const config = buildConfig(cliArgs);
  const source = cliArgs.file ? fs.readFileSync(cliArgs.file, "utf8") : SAMPLE_FORM;
  const messages = cliArgs.file || cliArgs.send.length > 0 ? cliArgs.send : SAMPLE_MESSAGES;

  const report = await runSession({
    source,
    messages,
    config,
    log: config.logging.verbose ? consoleLog("formwork", console.error) : undefined,
  });
  console.log(formatReport(report));
  if (!report.stoppedCleanly) process.exitCode = 2;
}

main().catch((e: unknown) => {
  if (isFormworkError(e)) {
    console.error(`${e.name} [${e.code}]: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exitCode = 1;
});
