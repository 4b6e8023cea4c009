/**
 * Document discovery and loading
 *
 * @module @scorecard/core/run/documents
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseDocumentJson, type DocumentRecord } from '../evidence/document.js';
import { DocumentUnreadableError } from '../reliability/errors.js';

export const DOCUMENT_EXTENSION = '.json';
export const REPORT_EXTENSION = '.md';

/**
 * List `*.json` files of a directory, sorted by name. A missing directory
 * yields an empty list.
 */
export function discoverDocumentFiles(directory: string): string[] {
  const absoluteDir = path.resolve(directory);

  if (!fs.existsSync(absoluteDir)) {
    return [];
  }

  return fs
    .readdirSync(absoluteDir)
    .filter((name) => name.endsWith(DOCUMENT_EXTENSION))
    .sort()
    .map((name) => path.join(absoluteDir, name));
}

/**
 * Identifier used when a document has no `paper_id`
 */
export function fallbackDocumentId(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Read and parse one document file
 *
 * @throws DocumentUnreadableError when the file cannot be read or parsed
 */
export function loadDocumentFile(filePath: string): DocumentRecord {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DocumentUnreadableError(
      filePath,
      `cannot read file (${error instanceof Error ? error.message : String(error)})`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  return parseDocumentJson(content, filePath, fallbackDocumentId(filePath));
}

/**
 * File name for a document's report. Characters outside [A-Za-z0-9._-]
 * are replaced so that ids cannot escape the reports directory.
 */
export function reportFileName(documentId: string): string {
  return `${reportStem(documentId)}${REPORT_EXTENSION}`;
}

function reportStem(documentId: string): string {
  const safe = documentId.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
  return safe || '_';
}

/**
 * Hands out one report file name per document within a run. A name that is
 * already taken (compared case-insensitively) gets a `-2`, `-3`, ... suffix.
 */
export class ReportNameRegistry {
  private readonly taken = new Set<string>();

  claim(documentId: string): { fileName: string; collided: boolean } {
    let fileName = reportFileName(documentId);
    let collided = false;

    for (let suffix = 2; this.taken.has(fileName.toLowerCase()); suffix++) {
      fileName = `${reportStem(documentId)}-${suffix}${REPORT_EXTENSION}`;
      collided = true;
    }

    this.taken.add(fileName.toLowerCase());
    return { fileName, collided };
  }
}
