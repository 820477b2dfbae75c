import * as fs from 'fs';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { GENERIC_TEMPLATE_CATEGORY, MessageTemplate } from './types';
import { ConfigError } from '../errors/errors';
import { logger } from '../observability/logger';

const templateSchema = {
  type: 'array',
  minItems: 1,
  items: {
    type: 'object',
    additionalProperties: false,
    required: ['name', 'category', 'language', 'body', 'slots'],
    properties: {
      name: { type: 'string', minLength: 1 },
      category: { type: 'string', minLength: 1 },
      language: { type: 'string', minLength: 1 },
      body: { type: 'string', minLength: 1 },
      slots: { type: 'array', items: { type: 'string', minLength: 1 } },
      maxSlotLength: { type: 'integer', minimum: 1 },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<MessageTemplate[]>(templateSchema);

/**
 * Validate a parsed template list. The list must contain a generic template,
 * and (name, language) pairs must be unique.
 */
export function parseTemplates(input: unknown): MessageTemplate[] {
  if (!validate(input)) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
    throw new ConfigError(`Invalid templates: ${errors}`);
  }

  const seen = new Set<string>();
  for (const template of input) {
    const key = `${template.name}/${template.language}`;
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate template ${key}`);
    }
    seen.add(key);
  }

  if (!input.some((t) => t.category === GENERIC_TEMPLATE_CATEGORY)) {
    throw new ConfigError(`Templates must include a "${GENERIC_TEMPLATE_CATEGORY}" template`);
  }
  return input;
}

export function loadTemplates(filePath: string): MessageTemplate[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Template file not found: ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse templates ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const templates = parseTemplates(parsed);
  logger.info({ filePath, count: templates.length }, 'Message templates loaded');
  return templates;
}
