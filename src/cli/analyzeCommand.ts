import path from "node:path";
import { parseArgs } from "node:util";
import { InputError, toAppError } from "../domain/errors.js";
import { DocumentFileType, LoadedDocument } from "../domain/types.js";
import { scanDirectory } from "../infra/parsers/documentLoader.js";
import { ChunkingOptions, assertValidChunking, estimateChunkCount } from "../pipelines/chunking.js";
import { DocumentLoader } from "../services/ingestionService.js";
import { countWords } from "../utils/text.js";
import { CliIo, withArgumentErrors } from "./io.js";

export const ANALYZE_USAGE =
  "Usage: npm run analyze -- (--file <path> | --directory <dir>) [--chunk-size <n>] [--overlap <n>]";

export interface AnalyzeArgs {
  file: string | null;
  directory: string | null;
  chunking: ChunkingOptions;
}

export interface DocumentStats {
  path: string;
  fileType: DocumentFileType;
  pages: number;
  characters: number;
  words: number;
  estimatedChunks: number;
}

export function parseAnalyzeArgs(argv: string[], defaults: ChunkingOptions): AnalyzeArgs {
  const { values } = withArgumentErrors(() =>
    parseArgs({
      args: argv,
      options: {
        file: { type: "string", short: "f" },
        directory: { type: "string", short: "d" },
        "chunk-size": { type: "string" },
        overlap: { type: "string" },
      },
    }),
  );

  const file = values.file ?? null;
  const directory = values.directory ?? null;
  if (Boolean(file) === Boolean(directory)) {
    throw new InputError("INVALID_ARGUMENTS", "Specify exactly one of --file or --directory.");
  }

  const chunking = {
    chunkSize: parseInteger(values["chunk-size"], defaults.chunkSize, "--chunk-size"),
    overlap: parseInteger(values.overlap, defaults.overlap, "--overlap"),
  };
  assertValidChunking(chunking);
  return { file, directory, chunking };
}

export function analyzeDocument(document: LoadedDocument, chunking: ChunkingOptions): DocumentStats {
  let characters = 0;
  let words = 0;
  let estimatedChunks = 0;
  for (const section of document.sections) {
    characters += section.text.length;
    words += countWords(section.text);
    if (section.text.trim()) {
      estimatedChunks += estimateChunkCount(section.text.length, chunking);
    }
  }
  return {
    path: document.path,
    fileType: document.fileType,
    pages: document.sections.length,
    characters,
    words,
    estimatedChunks,
  };
}

export async function runAnalyzeCommand(
  args: AnalyzeArgs,
  loadDocument: DocumentLoader,
  io: CliIo,
): Promise<number> {
  let files: string[];
  try {
    files = args.file ? [path.resolve(args.file)] : (await scanDirectory(args.directory ?? ".")).files;
  } catch (error) {
    io.err(toAppError(error).message);
    return 1;
  }
  if (files.length === 0) {
    io.err("No supported documents (.pdf, .docx) found.");
    return 1;
  }

  const analyzed: DocumentStats[] = [];
  let failures = 0;
  for (const file of files) {
    try {
      const stats = analyzeDocument(await loadDocument(file), args.chunking);
      analyzed.push(stats);
      io.out(
        `${stats.path} [${stats.fileType}] pages=${stats.pages} chars=${stats.characters} words=${stats.words} chunks~${stats.estimatedChunks}`,
      );
    } catch (error) {
      failures += 1;
      io.err(`${file}: ${toAppError(error).message}`);
    }
  }

  if (analyzed.length > 1) {
    const sum = (pick: (stats: DocumentStats) => number) =>
      analyzed.reduce((total, stats) => total + pick(stats), 0);
    io.out("");
    io.out(`files: ${analyzed.length} analyzed, ${failures} failed`);
    io.out(`pages: ${sum((s) => s.pages)}`);
    io.out(`chars: ${sum((s) => s.characters)}`);
    io.out(`words: ${sum((s) => s.words)}`);
    io.out(
      `estimated chunks: ${sum((s) => s.estimatedChunks)} (size ${args.chunking.chunkSize}, overlap ${args.chunking.overlap})`,
    );
  }

  return analyzed.length === 0 ? 1 : 0;
}

function parseInteger(raw: string | undefined, fallback: number, flag: string): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InputError("INVALID_ARGUMENTS", `${flag} must be an integer, got '${raw}'.`);
  }
  return value;
}
