import fs from "node:fs";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import type { SourceUnit } from "../types";

interface PdfText {
  total: number;
  pages: Array<{
    num: number;
    text: string;
  }>;
}

interface PdfTextParser {
  getText(): Promise<PdfText>;
  destroy(): Promise<void>;
}

export interface DocumentSourceDeps {
  parserFactory?: (data: Buffer) => PdfTextParser;
  readFile?: (filePath: string) => Promise<Buffer>;
}

const FORM_FEED = "\f";

function pageUnit(filePath: string, pageNumber: number, text: string): SourceUnit {
  const id = `${path.basename(filePath)}#${pageNumber}`;
  return {
    id,
    ordinal: pageNumber - 1,
    location: `${path.resolve(filePath)}#page=${pageNumber}`,
    kind: "document_page",
    content: text,
  };
}

export function isPdfPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".pdf";
}

/** One unit per PDF page, in page order, with the page text preloaded. */
export async function loadPdfUnits(filePath: string, deps: DocumentSourceDeps = {}): Promise<SourceUnit[]> {
  const readFile: (filePath: string) => Promise<Buffer> = deps.readFile ?? fs.promises.readFile;
  const parserFactory: (data: Buffer) => PdfTextParser = deps.parserFactory ?? ((data) => new PDFParse({ data }));

  const parser = parserFactory(await readFile(filePath));
  let result: PdfText;
  try {
    result = await parser.getText();
  } finally {
    await parser.destroy().catch(() => undefined);
  }

  return [...result.pages]
    .sort((left, right) => left.num - right.num)
    .map((page) => pageUnit(filePath, page.num, page.text));
}

/** Plain text documents: pages are separated by form feeds. */
export async function loadTextUnits(filePath: string, deps: Pick<DocumentSourceDeps, "readFile"> = {}): Promise<SourceUnit[]> {
  const readFile: (filePath: string) => Promise<Buffer> = deps.readFile ?? fs.promises.readFile;
  const text = (await readFile(filePath)).toString("utf-8");
  const pages = text.split(FORM_FEED);
  if (pages.length > 1 && pages[pages.length - 1].trim() === "") {
    pages.pop();
  }
  return pages.map((page, index) => pageUnit(filePath, index + 1, page));
}

export async function loadDocumentUnits(filePath: string, deps: DocumentSourceDeps = {}): Promise<SourceUnit[]> {
  return isPdfPath(filePath) ? loadPdfUnits(filePath, deps) : loadTextUnits(filePath, deps);
}
