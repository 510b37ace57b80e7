import { createInterface } from "node:readline/promises";
import "dotenv/config";
import { createAppServices } from "../src/app.js";
import {
  COLLECTION_USAGE,
  CollectionArgs,
  Confirm,
  parseCollectionArgs,
  runCollectionCommand,
} from "../src/cli/collectionCommand.js";
import { consoleIo } from "../src/cli/io.js";
import { loadConfig } from "../src/config/env.js";
import { toAppError } from "../src/domain/errors.js";
import { setLogLevel } from "../src/utils/logger.js";

const confirmOnTty: Confirm = async (question) => {
  if (!process.stdin.isTTY) {
    return null;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === "yes";
  } finally {
    rl.close();
  }
};

async function main(): Promise<number> {
  let args: CollectionArgs;
  try {
    args = parseCollectionArgs(process.argv.slice(2));
  } catch (error) {
    console.error(toAppError(error).message);
    console.error(COLLECTION_USAGE);
    return 1;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const services = await createAppServices(config);
  try {
    return await runCollectionCommand(args, services, consoleIo, confirmOnTty);
  } finally {
    await services.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Collection command failed: ${toAppError(error).message}`);
    process.exitCode = 1;
  });
