import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger.js';

export const UNKNOWN_PATENT_NUMBER = 'UNKNOWN';

/**
 * Claims of one patent, ready for segmentation
 */
export interface ClaimsDocument {
  patentNumber: string;
  claimsText: string;
  sourceFile?: string;
}

const PATENT_NUMBER_PATTERNS: readonly RegExp[] = [
  // 专利申请公布号：CN 202210107337
  /专利申请公布号[：:]?\s*([A-Z]{2}[ \t]*\d+(?:[A-Z]\d?)?)/i,
  // Patent No.: CN118284690A
  /Patent\s+No\.?\s*[:：]?\s*([A-Z]{2}[ \t]*\d+(?:[A-Z]\d?)?)/i,
  // Any bare CN118284690A
  /\b([A-Z]{2}[ \t]*\d{6,}(?:[A-Z]\d?)?)\b/,
];

const GENERATOR_FOOTER = /\*此文档由[^*]*?自动生成\*/g;
const SECTION_SEPARATOR = /^[ \t]*-{3,}[ \t]*$/m;

/**
 * "CN118284690A" → "CN 118284690A"; UNKNOWN when no pattern matches
 */
export function extractPatentNumber(content: string): string {
  for (const pattern of PATENT_NUMBER_PATTERNS) {
    const match = pattern.exec(content);
    if (match) {
      const compact = match[1].replace(/\s+/g, '').toUpperCase();
      return `${compact.slice(0, 2)} ${compact.slice(2)}`;
    }
  }
  return UNKNOWN_PATENT_NUMBER;
}

/**
 * Claim text: generator footers removed, then the last non-empty section after a --- separator
 */
export function extractClaimsText(content: string): string {
  const sections = content
    .replace(GENERATOR_FOOTER, '')
    .split(SECTION_SEPARATOR)
    .map((section) => section.trim())
    .filter((section) => section.length > 0);

  return sections[sections.length - 1] ?? '';
}

export function parseClaimsDocument(content: string, sourceFile?: string): ClaimsDocument {
  return {
    patentNumber: extractPatentNumber(content),
    claimsText: extractClaimsText(content),
    sourceFile,
  };
}

/**
 * Load a claims Markdown or text file
 *
 * @param filePath Path to the file (relative to the working directory or absolute)
 */
export async function loadClaimsDocument(filePath: string): Promise<ClaimsDocument> {
  const resolvedPath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const document = parseClaimsDocument(content, resolvedPath);

  logger.info('Claims document loaded', {
    file: resolvedPath,
    patentNumber: document.patentNumber,
    characters: document.claimsText.length,
  });
  return document;
}
