import "dotenv/config";
import {
  ANALYZE_USAGE,
  AnalyzeArgs,
  parseAnalyzeArgs,
  runAnalyzeCommand,
} from "../src/cli/analyzeCommand.js";
import { consoleIo } from "../src/cli/io.js";
import { toAppError } from "../src/domain/errors.js";
import { loadDocument } from "../src/infra/parsers/documentLoader.js";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../src/pipelines/chunking.js";

// Only chunking settings are read so documents can be sized before any provider is configured.
async function main(): Promise<number> {
  let args: AnalyzeArgs;
  try {
    args = parseAnalyzeArgs(process.argv.slice(2), {
      chunkSize: Number(process.env.CHUNK_SIZE || DEFAULT_CHUNK_SIZE),
      overlap: Number(process.env.CHUNK_OVERLAP || DEFAULT_CHUNK_OVERLAP),
    });
  } catch (error) {
    console.error(toAppError(error).message);
    console.error(ANALYZE_USAGE);
    return 1;
  }
  return runAnalyzeCommand(args, loadDocument, consoleIo);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Analysis failed: ${toAppError(error).message}`);
    process.exitCode = 1;
  });
