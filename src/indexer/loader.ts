/**
 * Document Loader
 *
 * Reads a .pdf, .txt or .md file into plain text for indexing.
 */

import { readFile } from 'node:fs/promises';

import {
  EmptyDocumentError,
  FileNotFoundError,
  ValidationError,
} from '../errors/index.js';
import {
  validateDocumentPath,
  type DocumentFormat,
  type PathValidationOptions,
} from '../utils/path-validation.js';

export interface LoadedDocument {
  /** Resolved absolute path */
  path: string;
  format: DocumentFormat;
  text: string;
  /** Page count for PDFs */
  pageCount?: number;
  sizeBytes: number;
  /** Non-fatal notes from path validation (symlinks, empty file) */
  warnings: string[];
}

/**
 * Extract the text layer of a PDF, one line per page.
 */
export async function extractPdfText(
  data: Uint8Array
): Promise<{ text: string; pageCount: number }> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const doc = await pdfjs.getDocument({ data, useSystemFonts: true }).promise;

  try {
    const pages: string[] = [];
    for (let i = 1; i <= doc.numPages; i++) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      const pageText = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ')
        .replace(/[ \t]+/g, ' ')
        .trim();
      pages.push(pageText);
    }
    return { text: pages.join('\n').trim(), pageCount: doc.numPages };
  } finally {
    await doc.destroy();
  }
}

/**
 * Load a document from disk.
 *
 * @example
 * ```typescript
 * const doc = await loadDocument('./paper.pdf');
 * console.log(`${doc.pageCount} pages, ${doc.text.length} characters`);
 * ```
 *
 * @throws FileNotFoundError if the path does not exist
 * @throws ValidationError if the file is unsupported, unreadable or not a valid PDF
 * @throws EmptyDocumentError if the file has no extractable text
 */
export async function loadDocument(
  inputPath: string,
  options: PathValidationOptions = {}
): Promise<LoadedDocument> {
  const validation = validateDocumentPath(inputPath, options);
  if (!validation.valid) {
    if (validation.reason === 'not_found') {
      throw new FileNotFoundError(inputPath);
    }
    throw new ValidationError(validation.error, [validation.hint]);
  }

  const { normalizedPath, format, sizeBytes, warnings } = validation;
  const bytes = await readFile(normalizedPath);

  let text: string;
  let pageCount: number | undefined;
  if (format === 'pdf') {
    try {
      ({ text, pageCount } = await extractPdfText(new Uint8Array(bytes)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Cannot read PDF: ${normalizedPath}`, [message]);
    }
  } else {
    text = bytes.toString('utf-8');
  }

  if (!text.trim()) {
    throw new EmptyDocumentError(normalizedPath);
  }

  return { path: normalizedPath, format, text, pageCount, sizeBytes, warnings };
}
