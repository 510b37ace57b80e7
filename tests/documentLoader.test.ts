import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  getFileType,
  getSupportedDocumentExtensions,
  loadDocument,
  scanDirectory,
} from "../src/infra/parsers/documentLoader.js";

const pdfState = vi.hoisted(() => ({
  pages: [] as Array<{ num: number; text: string }>,
  fail: false,
  destroyed: 0,
}));

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    constructor(readonly input: { data: Buffer }) {}

    async getText() {
      if (pdfState.fail) {
        throw new Error("bad XRef entry");
      }
      return { text: pdfState.pages.map((page) => page.text).join("\n"), pages: pdfState.pages };
    }

    async destroy() {
      pdfState.destroyed += 1;
    }
  },
}));

vi.mock("mammoth", () => ({
  default: {
    extractRawText: async ({ buffer }: { buffer: Buffer }) => ({
      value: `\r\n${buffer.toString("utf-8")}\t(docx)\r\n`,
      messages: [],
    }),
  },
}));


const TEMP_DIR = path.resolve(".tmp-tests", "document-loader");

beforeEach(async () => {
  pdfState.pages = [];
  pdfState.fail = false;
  pdfState.destroyed = 0;
  await fs.mkdir(TEMP_DIR, { recursive: true });
});

afterEach(async () => {
  await fs.rm(TEMP_DIR, { recursive: true, force: true });
});

describe("documentLoader", () => {
  it("detects supported extensions case-insensitively", () => {
    expect(getFileType("/docs/Manual.PDF")).toBe("pdf");
    expect(getFileType("faq.docx")).toBe("docx");
    expect(getFileType("notes.txt")).toBeNull();
    expect(getSupportedDocumentExtensions()).toEqual([".pdf", ".docx"]);
  });

  it("loads one section per PDF page", async () => {
    const filePath = path.join(TEMP_DIR, "manual.pdf");
    await fs.writeFile(filePath, "%PDF-1.4 placeholder");
    pdfState.pages = [
      { num: 1, text: "  Shipping takes three days.  " },
      { num: 2, text: "Refunds take five days." },
    ];

    const document = await loadDocument(filePath);

    expect(document).toEqual({
      path: filePath,
      fileType: "pdf",
      sections: [
        { page: 1, text: "Shipping takes three days." },
        { page: 2, text: "Refunds take five days." },
      ],
    });
    expect(pdfState.destroyed).toBe(1);
  });

  it("loads DOCX text as a single section without a page", async () => {
    const filePath = path.join(TEMP_DIR, "faq.docx");
    await fs.writeFile(filePath, "Opening hours are 9 to 5.");

    const document = await loadDocument(filePath);

    expect(document.fileType).toBe("docx");
    expect(document.sections).toEqual([{ page: null, text: "Opening hours are 9 to 5. (docx)" }]);
  });

  it("reports unsupported, unreadable and broken files with distinct codes", async () => {
    await expect(loadDocument(path.join(TEMP_DIR, "notes.txt"))).rejects.toMatchObject({
      code: "UNSUPPORTED_FILE_TYPE",
    });
    await expect(loadDocument(path.join(TEMP_DIR, "missing.pdf"))).rejects.toMatchObject({
      code: "FILE_UNREADABLE",
    });

    const broken = path.join(TEMP_DIR, "broken.pdf");
    await fs.writeFile(broken, "garbage");
    pdfState.fail = true;
    await expect(loadDocument(broken)).rejects.toMatchObject({
      code: "EXTRACTION_FAILED",
      message: `Failed to extract text from PDF ${broken}: bad XRef entry`,
    });
    expect(pdfState.destroyed).toBe(1);
  });

  it("scans directories recursively in sorted order", async () => {
    await fs.mkdir(path.join(TEMP_DIR, "nested"), { recursive: true });
    await fs.writeFile(path.join(TEMP_DIR, "b.pdf"), "");
    await fs.writeFile(path.join(TEMP_DIR, "a.DOCX"), "");
    await fs.writeFile(path.join(TEMP_DIR, "readme.md"), "");
    await fs.writeFile(path.join(TEMP_DIR, "nested", "c.pdf"), "");

    const scan = await scanDirectory(TEMP_DIR);

    expect(scan.files).toEqual([
      path.join(TEMP_DIR, "a.DOCX"),
      path.join(TEMP_DIR, "b.pdf"),
      path.join(TEMP_DIR, "nested", "c.pdf"),
    ]);
    expect(scan.counts).toEqual({ pdf: 2, docx: 1 });
  });

  it("rejects a missing directory", async () => {
    await expect(scanDirectory(path.join(TEMP_DIR, "nope"))).rejects.toMatchObject({
      code: "DIRECTORY_NOT_FOUND",
    });
  });
});
