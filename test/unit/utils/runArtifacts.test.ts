import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { ok } from '../../../src/core/errors.js';
import { PipelineController } from '../../../src/core/PipelineController.js';
import { RuleMerger } from '../../../src/core/RuleMerger.js';
import {
  buildOutputDocument,
  buildRunSummary,
  fileSafePatentNumber,
  writeRunArtifacts,
} from '../../../src/utils/runArtifacts.js';
import { FakeReasoningClient, RULE_RESPONSE, makeCandidate, makeOutcome } from '../../helpers/fixtures.js';

const NOW = new Date('2026-10-18T09:05:03.000Z');

describe('fileSafePatentNumber', () => {
  it('replaces separators with underscores', () => {
    expect(fileSafePatentNumber('CN 202210107337')).toBe('CN_202210107337');
    expect(fileSafePatentNumber(' ')).toBe('UNKNOWN');
  });
});

describe('buildOutputDocument', () => {
  it('writes rules in the output field names', () => {
    const ruleSet = new RuleMerger().merge([makeOutcome(0, [makeCandidate()], { confidence: 0.81234 })]);

    const document = buildOutputDocument({ patentNumber: 'CN 1', group: 2, ruleSet }, NOW);

    expect(document).toEqual({
      patent_number: 'CN 1',
      group: 2,
      rules: [
        {
          wild_type: 'SEQ ID NO:2',
          rule: 'identity_threshold',
          mutation: 'Y178A/F186R',
          mutation_logic: 'Y178A AND F186R',
          identity_logic: 'seq_identity>=90%',
          statement: 'Variants of SEQ ID NO:2 carrying Y178A and F186R',
          comment: '',
        },
      ],
      metadata: {
        total_rules: 1,
        claims_analyzed: 1,
        processing_timestamp: '2026-10-18T09:05:03.000Z',
        analysis_confidence: 0.812,
      },
    });
  });
});

describe('writeRunArtifacts', () => {
  it('writes the rules and summary files into a timestamped directory', async () => {
    const client = new FakeReasoningClient(() => Promise.resolve(ok(RULE_RESPONSE)));
    const result = await new PipelineController(client).run({ patentNumber: 'CN 1', claimsText: '1. alpha' });
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rules-out-'));

    try {
      const paths = await writeRunArtifacts(result, outputDir, NOW);

      expect(paths.directory).toBe(path.join(outputDir, 'CN_1_20261018_090503'));
      expect(paths.rulesPath).toBe(path.join(paths.directory, 'CN_1_rules.json'));
      expect(JSON.parse(await fs.readFile(paths.rulesPath, 'utf-8'))).toEqual(result.document);

      const summary: unknown = JSON.parse(await fs.readFile(paths.summaryPath, 'utf-8'));
      expect(summary).toEqual(JSON.parse(JSON.stringify(buildRunSummary(result, NOW))));
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  });
});
