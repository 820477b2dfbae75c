import * as path from 'path';
import { MessageCatalog } from '../../src/delivery/message-catalog';
import { loadTemplates, parseTemplates } from '../../src/delivery/template-registry';
import { MESSAGE_KEYS } from '../../src/delivery/types';
import { ConfigError } from '../../src/errors/errors';

const CONFIG_DIR = path.join(__dirname, '..', '..', 'config');

function fullLocale(prefix: string): Record<string, string> {
  return Object.fromEntries(MESSAGE_KEYS.map((key) => [key, `${prefix} ${key} {{question}}`]));
}

describe('MessageCatalog', () => {
  it('should fill placeholders and leave unknown ones empty', () => {
    const catalog = MessageCatalog.parse({ en: fullLocale('EN') }, 'en');

    expect(catalog.text('no_answer', 'en', { question: 'Can I swim?' })).toBe('EN no_answer Can I swim?');
    expect(catalog.text('no_answer', 'en')).toBe('EN no_answer ');
  });

  it('should fall back to the default locale key by key', () => {
    const catalog = MessageCatalog.parse({ en: fullLocale('EN'), hi: { no_answer: 'HI {{question}}' } }, 'en');

    expect(catalog.text('no_answer', 'hi', { question: 'q' })).toBe('HI q');
    expect(catalog.text('still_working', 'hi', { question: 'q' })).toBe('EN still_working q');
    expect(catalog.text('still_working', 'fr', { question: 'q' })).toBe('EN still_working q');
  });

  it('should compose content with the key as category and the values as slots', () => {
    const catalog = MessageCatalog.parse({ en: fullLocale('EN') }, 'en');

    expect(catalog.compose('verified_answer', 'en', { question: 'q', answer: 'a' })).toEqual({
      category: 'verified_answer',
      text: 'EN verified_answer q',
      slots: { question: 'q', answer: 'a' },
    });
  });

  it('should require every key in the default locale', () => {
    expect(() => MessageCatalog.parse({ en: { no_answer: 'Sorry' } }, 'en')).toThrow(ConfigError);
    expect(() => MessageCatalog.parse({ hi: fullLocale('HI') }, 'en')).toThrow(ConfigError);
  });

  it('should reject unknown message keys', () => {
    expect(() => MessageCatalog.parse({ en: { ...fullLocale('EN'), greeting: 'Hello' } }, 'en')).toThrow(ConfigError);
  });

  it('should load the shipped catalog', () => {
    const catalog = MessageCatalog.load(path.join(CONFIG_DIR, 'messages.yaml'), 'en');

    expect(catalog.locales()).toEqual(['en', 'hi']);
    expect(catalog.text('verified_answer', 'en', { answer: 'Rest.' })).toBe('Rest.\n\n(Verified by our expert)');
  });

  it('should fail on a missing catalog file', () => {
    expect(() => MessageCatalog.load(path.join(CONFIG_DIR, 'missing.yaml'), 'en')).toThrow(ConfigError);
  });
});

describe('TemplateRegistry', () => {
  const generic = { name: 'generic_v1', category: 'generic', language: 'en', body: 'Update', slots: [] };

  it('should accept a list with a generic template', () => {
    expect(parseTemplates([generic])).toEqual([generic]);
  });

  it('should require a generic template', () => {
    expect(() => parseTemplates([{ ...generic, category: 'verified_answer' }])).toThrow(ConfigError);
  });

  it('should reject duplicate name and language pairs', () => {
    expect(() => parseTemplates([generic, { ...generic, body: 'Other' }])).toThrow(ConfigError);
    expect(parseTemplates([generic, { ...generic, language: 'hi' }])).toHaveLength(2);
  });

  it('should reject malformed entries', () => {
    expect(() => parseTemplates([{ ...generic, slots: 'answer' }])).toThrow(ConfigError);
    expect(() => parseTemplates([{ ...generic, maxSlotLength: 0 }])).toThrow(ConfigError);
    expect(() => parseTemplates([])).toThrow(ConfigError);
  });

  it('should load the shipped templates', () => {
    const templates = loadTemplates(path.join(CONFIG_DIR, 'templates.yaml'));

    expect(templates.filter((t) => t.category === 'generic').map((t) => t.language)).toEqual(['en', 'hi']);
    expect(templates.find((t) => t.name === 'verified_answer_v1' && t.language === 'en')?.slots).toEqual(['answer']);
  });
});
