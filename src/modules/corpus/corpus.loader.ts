import { createHash } from "crypto";
import fs from "fs/promises";
import path from "path";
import iconv from "iconv-lite";
import { ConfigError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { Document } from "../rag/types";
import { parseHtmlDocument } from "./html.parser";
import { cleanText } from "./text.cleaner";

export type CorpusEncoding = "utf8" | "win1251";

export interface LoadCorpusOptions {
  encoding?: CorpusEncoding;
  logger?: Logger;
}

const TEXT_EXTENSIONS = new Set([".txt", ".md"]);
const HTML_EXTENSIONS = new Set([".html", ".htm"]);

export function isSupportedFile(fileName: string): boolean {
  const extension = path.extname(fileName).toLowerCase();
  return TEXT_EXTENSIONS.has(extension) || HTML_EXTENSIONS.has(extension);
}

/**
 * Decodes file bytes; a leading BOM is dropped.
 */
export function decodeBuffer(buffer: Buffer, encoding: CorpusEncoding = "utf8"): string {
  return iconv.decode(buffer, encoding);
}

export function documentIdFor(sourceName: string): string {
  return createHash("sha1").update(sourceName).digest("hex").slice(0, 16);
}

/**
 * Builds a document from decoded file content. Returns null when nothing
 * readable is left after cleaning.
 */
export function toDocument(sourceName: string, content: string): Document | null {
  const extension = path.extname(sourceName).toLowerCase();
  const text = HTML_EXTENSIONS.has(extension) ? parseHtmlDocument(content).text : content;
  const rawText = cleanText(text);
  if (!rawText) return null;

  return { id: documentIdFor(sourceName), sourceName, rawText };
}

async function listFiles(root: string, relative = ""): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, entryPath)));
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      files.push(entryPath);
    }
  }

  return files;
}

/**
 * Reads every `.txt`, `.md` and `.html` file under `dir`. Documents are
 * named by their path relative to `dir` (always with `/`) and returned in
 * path order.
 */
export async function loadCorpus(dir: string, options: LoadCorpusOptions = {}): Promise<Document[]> {
  const logger = options.logger ?? new NullLogger();
  const encoding = options.encoding ?? "utf8";

  let files: string[];
  try {
    files = await listFiles(dir);
  } catch (error) {
    throw new ConfigError(`Corpus directory "${dir}" cannot be read`, [], error);
  }
  files.sort();

  const documents: Document[] = [];
  for (const file of files) {
    const buffer = await fs.readFile(path.join(dir, file));
    const document = toDocument(file, decodeBuffer(buffer, encoding));
    if (document) {
      documents.push(document);
    } else {
      logger.warn(`[Corpus] Skipping empty document ${file}`);
    }
  }

  if (documents.length === 0) {
    logger.warn(`[Corpus] No documents found in ${dir}`);
  } else {
    logger.info(`[Corpus] Loaded ${documents.length} documents from ${dir}`);
  }
  return documents;
}
