import fs from 'fs/promises';
import path from 'path';
import { ConfigurationError } from '../core/errors.js';
import type { KnownRule } from '../models/types.js';
import { logger } from './logger.js';
import { SchemaValidator, formatErrors } from './validators.js';

const knownRuleProperties = {
  patent_number: { type: 'string' },
  wild_type: { type: 'string' },
  rule: { type: 'string' },
  mutation: { type: 'string' },
  mutation_logic: { type: 'string' },
  identity_logic: { type: 'string' },
  statement: { type: 'string' },
  comment: { type: 'string' },
};

const knownRulesSchema = {
  type: 'array',
  items: { type: 'object', properties: knownRuleProperties },
};

const knownRulesValidator = new SchemaValidator<KnownRule[]>('known-rules', knownRulesSchema);

/**
 * Accepts { rules: [...] } or a bare array
 */
export function parseKnownRules(data: unknown, source: string = 'rules'): KnownRule[] {
  const list: unknown =
    typeof data === 'object' && data !== null && !Array.isArray(data) ? Reflect.get(data, 'rules') : data;

  const result = knownRulesValidator.validate(list);
  if (!result.valid || !result.data) {
    const details = formatErrors(result.errors);
    throw new ConfigurationError(
      `Invalid known rules in ${source}`,
      details.length > 0 ? details : ['expected { "rules": [...] } or an array of rules']
    );
  }
  return result.data;
}

/**
 * Load previously known rules, used as the calibration sample
 */
export async function loadExistingRules(filePath: string): Promise<KnownRule[]> {
  const resolvedPath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const rules = parseKnownRules(JSON.parse(content), resolvedPath);

  logger.info('Known rules loaded', { file: resolvedPath, rules: rules.length });
  return rules;
}
