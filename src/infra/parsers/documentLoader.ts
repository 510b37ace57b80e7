import { promises as fs } from "node:fs";
import path from "node:path";
import mammoth from "mammoth";
import { InputError, describeError } from "../../domain/errors.js";
import { DocumentFileType, DocumentSection, LoadedDocument } from "../../domain/types.js";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS: Record<string, DocumentFileType> = {
  ".pdf": "pdf",
  ".docx": "docx",
};

export interface DirectoryScanResult {
  directory: string;
  files: string[];
  counts: Record<DocumentFileType, number>;
}

export function getFileType(filePath: string): DocumentFileType | null {
  return SUPPORTED_EXTENSIONS[path.extname(filePath).toLowerCase()] ?? null;
}

export function isSupportedDocumentExtension(filePath: string): boolean {
  return getFileType(filePath) !== null;
}

export function getSupportedDocumentExtensions(): string[] {
  return Object.keys(SUPPORTED_EXTENSIONS);
}

export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  const absolutePath = path.resolve(filePath);
  const fileType = requireFileType(absolutePath);

  let data: Buffer;
  try {
    data = await fs.readFile(absolutePath);
  } catch (error) {
    throw new InputError("FILE_UNREADABLE", `Cannot read ${absolutePath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  return loadDocumentFromBuffer(absolutePath, data);
}

export async function loadDocumentFromBuffer(
  sourcePath: string,
  data: Buffer,
): Promise<LoadedDocument> {
  const fileType = requireFileType(sourcePath);

  let sections: DocumentSection[];
  try {
    sections = fileType === "pdf" ? await extractPdfSections(data) : await extractDocxSections(data);
  } catch (error) {
    throw new InputError(
      "EXTRACTION_FAILED",
      `Failed to extract text from ${fileType.toUpperCase()} ${sourcePath}: ${describeError(error)}`,
      { cause: error },
    );
  }

  return { path: sourcePath, fileType, sections };
}

/** Lists supported documents below `directory` without reading them. */
export async function scanDirectory(directory: string): Promise<DirectoryScanResult> {
  const absoluteDir = path.resolve(directory);
  try {
    const stat = await fs.stat(absoluteDir);
    if (!stat.isDirectory()) {
      throw new InputError("DIRECTORY_NOT_FOUND", `Not a directory: ${absoluteDir}`);
    }
  } catch (error) {
    if (error instanceof InputError) {
      throw error;
    }
    throw new InputError("DIRECTORY_NOT_FOUND", `Directory not found: ${absoluteDir}`, {
      cause: error,
    });
  }

  const files: string[] = [];
  await walk(absoluteDir, files);
  files.sort((a, b) => a.localeCompare(b));

  const counts: Record<DocumentFileType, number> = { pdf: 0, docx: 0 };
  for (const file of files) {
    const fileType = getFileType(file);
    if (fileType) {
      counts[fileType] += 1;
    }
  }

  return { directory: absoluteDir, files, counts };
}

async function walk(directory: string, files: string[]): Promise<void> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, files);
    } else if (entry.isFile() && isSupportedDocumentExtension(entry.name)) {
      files.push(fullPath);
    }
  }
}

function requireFileType(filePath: string): DocumentFileType {
  const fileType = getFileType(filePath);
  if (!fileType) {
    const ext = path.extname(filePath).toLowerCase() || "(none)";
    throw new InputError(
      "UNSUPPORTED_FILE_TYPE",
      `Unsupported extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }
  return fileType;
}

async function extractDocxSections(data: Buffer): Promise<DocumentSection[]> {
  const result = await mammoth.extractRawText({ buffer: data });
  return [{ page: null, text: normalizeText(result.value) }];
}

async function extractPdfSections(data: Buffer): Promise<DocumentSection[]> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => ({ page: page.num, text: normalizeText(page.text) }));
  } finally {
    await parser.destroy();
  }
}
