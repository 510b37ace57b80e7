import "dotenv/config";
import { createAppServices } from "../src/app.js";
import { INGEST_USAGE, IngestArgs, parseIngestArgs, runIngestCommand } from "../src/cli/ingestCommand.js";
import { consoleIo } from "../src/cli/io.js";
import { loadConfig } from "../src/config/env.js";
import { toAppError } from "../src/domain/errors.js";
import { setLogLevel } from "../src/utils/logger.js";

async function main(): Promise<number> {
  let args: IngestArgs;
  try {
    args = parseIngestArgs(process.argv.slice(2));
  } catch (error) {
    console.error(toAppError(error).message);
    console.error(INGEST_USAGE);
    return 1;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const services = await createAppServices(config);
  try {
    return await runIngestCommand(args, services, consoleIo);
  } finally {
    await services.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Ingestion failed: ${toAppError(error).message}`);
    process.exitCode = 1;
  });
