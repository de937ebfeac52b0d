import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerMigrate } from "./app/Migrate";

const logger = createDefaultLoggerFromEnv();
const cli = cac("photo-library-migrate");

registerMigrate(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  await dispose(logger);
  process.exit(1);
}
await dispose(logger);
