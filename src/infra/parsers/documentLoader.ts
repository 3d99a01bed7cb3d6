import { promises as fs } from "node:fs";
import path from "node:path";
import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { UnsupportedDocumentError } from "../../domain/errors.js";
import { PageText, SourceDocument } from "../../domain/types.js";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf", ".docx"]);

/** Running length after which a DOCX pseudo-page is closed. */
export const DOCX_PAGE_CHARS = 1000;

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export function assertSupportedExtension(filePath: string): void {
  if (!isSupportedDocumentExtension(filePath)) {
    throw new UnsupportedDocumentError(
      path.extname(filePath).toLowerCase(),
      getSupportedDocumentExtensions(),
    );
  }
}

export async function loadDocument(filePath: string): Promise<SourceDocument> {
  assertSupportedExtension(filePath);
  const data = await fs.readFile(filePath);
  return loadDocumentFromBuffer(path.basename(filePath), data);
}

/** Pages that yield no text are omitted; the document itself may end up empty. */
export async function loadDocumentFromBuffer(
  sourceName: string,
  data: Buffer,
): Promise<SourceDocument> {
  assertSupportedExtension(sourceName);
  const ext = path.extname(sourceName).toLowerCase();

  let pages: PageText[];
  if (ext === ".pdf") {
    pages = await extractPdfPages(data);
  } else if (ext === ".docx") {
    pages = await extractDocxPages(data);
  } else {
    pages = toPlainTextPages(data.toString("utf-8"));
  }

  return { name: sourceName, pages };
}

export function toPlainTextPages(content: string): PageText[] {
  const text = normalizeText(content);
  return text ? [{ text, pageNumber: 1 }] : [];
}

/** Groups paragraphs into pseudo-pages of roughly {@link DOCX_PAGE_CHARS}. */
export function groupParagraphsIntoPages(
  paragraphs: readonly string[],
  pageChars: number = DOCX_PAGE_CHARS,
): PageText[] {
  const pages: PageText[] = [];
  let current = "";

  for (const paragraph of paragraphs) {
    if (current.length > pageChars) {
      pushPage(pages, current);
      current = "";
    }
    current += `${paragraph}\n`;
  }
  pushPage(pages, current);

  return pages;
}

async function extractPdfPages(data: Buffer): Promise<PageText[]> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    const pages: PageText[] = [];
    for (const page of result.pages) {
      const text = normalizeText(page.text ?? "");
      if (text) {
        pages.push({ text, pageNumber: page.num });
      }
    }
    return pages;
  } finally {
    await parser.destroy();
  }
}

async function extractDocxPages(data: Buffer): Promise<PageText[]> {
  const { value } = await mammoth.extractRawText({ buffer: data });
  const paragraphs = value.replace(/\r\n/g, "\n").split(/\n+/);
  return groupParagraphsIntoPages(paragraphs);
}

function pushPage(pages: PageText[], raw: string): void {
  const text = normalizeText(raw);
  if (text) {
    pages.push({ text, pageNumber: pages.length + 1 });
  }
}
