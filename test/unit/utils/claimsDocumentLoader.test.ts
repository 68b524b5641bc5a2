import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  UNKNOWN_PATENT_NUMBER,
  extractClaimsText,
  extractPatentNumber,
  loadClaimsDocument,
} from '../../../src/utils/claimsDocumentLoader.js';

const DOCUMENT = [
  '# 一种脂肪酶变体',
  '专利申请公布号：CN 202210107337',
  '---',
  '1. alpha',
  '2. beta',
  '',
  '*此文档由转换工具自动生成*',
  '',
].join('\n');

describe('extractPatentNumber', () => {
  it('reads labeled and bare publication numbers', () => {
    expect(extractPatentNumber('专利申请公布号：CN 202210107337\n')).toBe('CN 202210107337');
    expect(extractPatentNumber('Patent No.: cn118284690a')).toBe('CN 118284690A');
    expect(extractPatentNumber('See CN118284690A for details')).toBe('CN 118284690A');
  });

  it('falls back to UNKNOWN', () => {
    expect(extractPatentNumber('No patent here 12345')).toBe(UNKNOWN_PATENT_NUMBER);
  });
});

describe('extractClaimsText', () => {
  it('takes the last section and drops generator footers', () => {
    expect(extractClaimsText(DOCUMENT)).toBe('1. alpha\n2. beta');
  });

  it('ignores a trailing section holding only a footer', () => {
    expect(extractClaimsText('1. a\n---\n*此文档由X自动生成*')).toBe('1. a');
  });
});

describe('loadClaimsDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'claims-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a claims file', async () => {
    const file = path.join(dir, 'CN202210107337_claims.md');
    await fs.writeFile(file, DOCUMENT, 'utf-8');

    const document = await loadClaimsDocument(file);

    expect(document).toEqual({
      patentNumber: 'CN 202210107337',
      claimsText: '1. alpha\n2. beta',
      sourceFile: file,
    });
  });
});
