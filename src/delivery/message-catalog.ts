import * as fs from 'fs';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { DeliveryContent, MESSAGE_KEYS, MessageKey } from './types';
import { fillPlaceholders } from './delivery-selector';
import { ConfigError } from '../errors/errors';
import { logger } from '../observability/logger';

export type MessageTable = Record<string, Partial<Record<MessageKey, string>>>;

const catalogSchema = {
  type: 'object',
  minProperties: 1,
  additionalProperties: {
    type: 'object',
    propertyNames: { enum: [...MESSAGE_KEYS] },
    additionalProperties: { type: 'string', minLength: 1 },
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<MessageTable>(catalogSchema);

/**
 * Localized free-form texts, one per message key. A locale may leave keys
 * out; those fall back to the default locale, which must define them all.
 */
export class MessageCatalog {
  constructor(private readonly table: MessageTable, private readonly defaultLocale: string) {
    const defaults = table[defaultLocale];
    if (!defaults) {
      throw new ConfigError(`Message catalog has no entries for default locale "${defaultLocale}"`);
    }
    const missing = MESSAGE_KEYS.filter((key) => !defaults[key]);
    if (missing.length > 0) {
      throw new ConfigError(`Message catalog default locale is missing: ${missing.join(', ')}`);
    }
  }

  static parse(input: unknown, defaultLocale: string): MessageCatalog {
    if (!validate(input)) {
      const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
      throw new ConfigError(`Invalid message catalog: ${errors}`);
    }
    return new MessageCatalog(input, defaultLocale);
  }

  static load(filePath: string, defaultLocale: string): MessageCatalog {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Message catalog not found: ${filePath}`);
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse message catalog ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const catalog = MessageCatalog.parse(parsed, defaultLocale);
    logger.info({ filePath, locales: catalog.locales() }, 'Message catalog loaded');
    return catalog;
  }

  locales(): string[] {
    return Object.keys(this.table);
  }

  text(key: MessageKey, locale: string, vars: Record<string, string> = {}): string {
    const body = this.table[locale]?.[key] ?? this.table[this.defaultLocale]?.[key] ?? '';
    return fillPlaceholders(body, (name) => vars[name] ?? '');
  }

  /** Free-form text plus the same values offered to template slots */
  compose(key: MessageKey, locale: string, vars: Record<string, string> = {}): DeliveryContent {
    return { category: key, text: this.text(key, locale, vars), slots: { ...vars } };
  }
}
