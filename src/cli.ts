#!/usr/bin/env node
import { Command } from "commander";
import { CliFlags, loadConfig, loadEnvFile } from "./config";
import DownloadRunner from "./downloadRunner";
import { ReportedError, errorMessage } from "./errors";
import ConsoleLogger from "./logger";
import ConsolePresentation from "./presentation";

const program = new Command();
program
  .name("runalyze-export")
  .description("Download FIT/TCX workout files from Runalyze")
  .version("0.1.0");

program
  .command("download")
  .description("Download activities week by week, newest first")
  .option("-u, --username <username>", "Runalyze username (env RUNALYZE_USERNAME)")
  .option("-p, --password <password>", "Runalyze password (env RUNALYZE_PASSWORD)")
  .option("--cookie-path <path>", "session cookie file (env RUNALYZE_COOKIE_PATH)")
  .option("--save-dir <dir>", "directory for downloaded files (env RUNALYZE_SAVE_DIR)")
  .option("--until <date>", "newest date to include: YYYY-MM-DD, YYYY-MM or YYYY")
  .option("--since <date|duration>", "oldest date, or a duration before --until such as 4w, 30d, 6m, 1y")
  .option("--json", "print JSON lines instead of interactive output")
  .option("--log-level <level>", "trace, debug, info, warn or error (env LOG_LEVEL)")
  .option("-c, --config <file>", "env file to load instead of .env")
  .action(async (flags: CliFlags) => {
    loadEnvFile(flags.config);
    const config = loadConfig(flags);

    const logger = new ConsoleLogger(config.logLevel, "download");
    const runner = new DownloadRunner({
      logger,
      presentation: new ConsolePresentation(config.jsonMode),
    });

    await runner.run(config);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (!(error instanceof ReportedError)) {
    console.error(`❌ ${errorMessage(error)}`);
  }
  process.exit(1);
});
