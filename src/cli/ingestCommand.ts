import { parseArgs } from "node:util";
import { AppServices } from "../app.js";
import { InputError, toAppError } from "../domain/errors.js";
import { IngestionProgressEvent, IngestionReport } from "../services/ingestionService.js";
import { CliIo, withArgumentErrors } from "./io.js";

export const INGEST_USAGE = `Usage: npm run ingest -- (--file <path> | --directory <dir>) [--source-info <label>] [--list-files]`;

export interface IngestArgs {
  file: string | null;
  directory: string | null;
  sourceInfo: string | null;
  listFiles: boolean;
}

export function parseIngestArgs(argv: string[]): IngestArgs {
  const { values } = withArgumentErrors(() =>
    parseArgs({
      args: argv,
      options: {
        file: { type: "string", short: "f" },
        directory: { type: "string", short: "d" },
        "source-info": { type: "string", short: "s" },
        "list-files": { type: "boolean", short: "l" },
      },
    }),
  );

  const args: IngestArgs = {
    file: values.file ?? null,
    directory: values.directory ?? null,
    sourceInfo: values["source-info"] ?? null,
    listFiles: values["list-files"] ?? false,
  };

  if (!args.file && !args.directory) {
    throw new InputError("INVALID_ARGUMENTS", "Either --file or --directory must be specified.");
  }
  if (args.file && args.directory) {
    throw new InputError("INVALID_ARGUMENTS", "Use either --file or --directory, not both.");
  }
  if (args.listFiles && !args.directory) {
    throw new InputError("INVALID_ARGUMENTS", "--list-files requires --directory.");
  }
  return args;
}

/** Resolves to the process exit code. */
export async function runIngestCommand(
  args: IngestArgs,
  services: AppServices,
  io: CliIo,
): Promise<number> {
  const { config, collections, ingestion } = services;

  if (args.listFiles && args.directory) {
    const scan = await ingestion.listCandidates(args.directory);
    io.out(`Supported files in ${scan.directory}:`);
    for (const file of scan.files) {
      io.out(`  ${file}`);
    }
    io.out(`Total: ${scan.files.length} (pdf: ${scan.counts.pdf}, docx: ${scan.counts.docx})`);
    return 0;
  }

  try {
    const created = await collections.create(config.collectionName, {
      dimension: config.vectorDimension,
      distance: config.vectorDistance,
      recreate: false,
    });
    io.out(
      `Collection '${config.collectionName}': ${created.action} (${created.status.vectorCount} vectors)`,
    );
  } catch (error) {
    io.err(`Failed to prepare collection: ${toAppError(error).message}`);
    return 1;
  }

  let paths: string[];
  if (args.file) {
    paths = [args.file];
  } else {
    try {
      paths = (await ingestion.listCandidates(args.directory ?? ".")).files;
    } catch (error) {
      io.err(toAppError(error).message);
      return 1;
    }
  }
  if (paths.length === 0) {
    io.err("No supported documents (.pdf, .docx) found.");
    return 1;
  }

  const report = await ingestion.ingestPaths(paths, {
    sourceLabel: args.sourceInfo,
    onProgress: (event) => printProgress(io, event),
  });
  printReport(io, report);

  return report.succeeded.length === 0 ? 1 : 0;
}

function printProgress(io: CliIo, event: IngestionProgressEvent) {
  switch (event.type) {
    case "document-started":
      io.out(`[${event.index + 1}/${event.total}] ${event.path}`);
      break;
    case "batch-stored":
      io.out(`  stored batch ${event.batchNumber}/${event.totalBatches} (${event.records} chunks)`);
      break;
    case "document-finished":
      io.out(`  done: ${event.chunkCount} chunks`);
      break;
    case "document-failed":
      io.err(`  failed [${event.code}]: ${event.reason}`);
      break;
  }
}

function printReport(io: CliIo, report: IngestionReport) {
  io.out("");
  io.out("Ingestion Summary");
  io.out("=================");
  io.out(`collection: ${report.collection}`);
  io.out(`documents: ${report.succeeded.length} succeeded, ${report.failed.length} failed`);
  io.out(`chunks: ${report.totalChunks}`);
  for (const failure of report.failed) {
    const tag = failure.retryable ? `${failure.code}, retryable` : failure.code;
    io.err(`failed: ${failure.path} [${tag}] ${failure.reason}`);
  }
}
