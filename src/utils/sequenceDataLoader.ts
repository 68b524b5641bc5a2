import fs from 'fs/promises';
import path from 'path';
import { ConfigurationError } from '../core/errors.js';
import type { SequenceEntry } from '../models/types.js';
import { logger } from './logger.js';
import { SchemaValidator, formatErrors } from './validators.js';

const sequenceDataSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['sequence_id'],
    properties: {
      sequence_id: { type: 'string', minLength: 1 },
    },
  },
};

const sequenceDataValidator = new SchemaValidator<SequenceEntry[]>('sequence-data', sequenceDataSchema);

/**
 * Accepts { sequences: [...] } or a bare array of sequence entries
 */
export function parseSequenceData(data: unknown, source: string = 'sequences'): SequenceEntry[] {
  const list: unknown =
    typeof data === 'object' && data !== null && !Array.isArray(data) ? Reflect.get(data, 'sequences') : data;

  const result = sequenceDataValidator.validate(list);
  if (!result.valid || !result.data) {
    const details = formatErrors(result.errors);
    throw new ConfigurationError(
      `Invalid sequence data in ${source}`,
      details.length > 0 ? details : ['expected { "sequences": [...] } or an array of sequence entries']
    );
  }
  return result.data;
}

/**
 * Load a sequence listing already converted to JSON
 */
export async function loadSequenceData(filePath: string): Promise<SequenceEntry[]> {
  const resolvedPath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const sequences = parseSequenceData(JSON.parse(content), resolvedPath);

  logger.info('Sequence data loaded', { file: resolvedPath, sequences: sequences.length });
  return sequences;
}
