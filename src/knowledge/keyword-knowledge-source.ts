import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { KnowledgeCandidate } from '../config/types';
import { FAQEntry, KnowledgeSearchOptions, KnowledgeSource } from './types';
import { ConfigError } from '../errors/errors';
import { logger } from '../observability/logger';
import stopWordList from './stop-words.json';

const STOP_WORDS = new Set<string>(stopWordList);

const faqSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'question', 'answer', 'tags', 'category'],
    properties: {
      id: { type: 'string', minLength: 1 },
      question: { type: 'string', minLength: 1 },
      answer: { type: 'string', minLength: 1 },
      tags: { type: 'array', items: { type: 'string' } },
      category: { type: 'string' },
      locale: { type: 'string' },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateFaq = ajv.compile<FAQEntry[]>(faqSchema);

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

/**
 * Drop stop words and one-letter terms. If nothing meaningful is left
 * (e.g. "what is it"), keep the original terms.
 */
export function filterStopWords(terms: string[]): string[] {
  const meaningful = terms.filter((t) => !STOP_WORDS.has(t) && t.length > 1);
  return meaningful.length > 0 ? meaningful : terms;
}

/**
 * Fraction of terms found in `text`, with a half-point bonus per term that
 * also appears in the curated tags.
 */
export function scoreText(text: string, terms: string[], tagText: string): number {
  if (terms.length === 0) return 0;
  let score = 0;
  for (const term of terms) {
    if (text.includes(term)) {
      score += 1;
      if (tagText.includes(term)) score += 0.5;
    }
  }
  return score / terms.length;
}

/** Keyword-overlap search over one FAQ collection */
export class KeywordKnowledgeSource implements KnowledgeSource {
  constructor(readonly name: string, private readonly entries: readonly FAQEntry[]) {}

  async search(text: string, options: KnowledgeSearchOptions): Promise<KnowledgeCandidate[]> {
    const terms = filterStopWords(tokenize(text));
    const results: KnowledgeCandidate[] = [];

    for (const entry of this.entries) {
      if (options.locale && entry.locale && entry.locale !== options.locale) continue;
      const tagText = entry.tags.join(' ').toLowerCase();
      const haystack = `${entry.question} ${entry.answer} ${tagText}`.toLowerCase();
      const score = scoreText(haystack, terms, tagText);
      if (score > 0) {
        results.push({ content: entry.answer, sourceId: `${this.name}/${entry.id}`, score });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, options.topK);
  }

  get size(): number {
    return this.entries.length;
  }

  static fromFile(filePath: string): KeywordKnowledgeSource {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf-8')) ?? [];
    } catch (err) {
      throw new ConfigError(`Failed to load knowledge file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!validateFaq(parsed)) {
      const errors = validateFaq.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
      throw new ConfigError(`Invalid knowledge file ${filePath}: ${errors}`);
    }
    const name = path.basename(filePath).replace(/\.ya?ml$/, '');
    return new KeywordKnowledgeSource(name, parsed);
  }
}

/** One source per YAML file in `dir` */
export function loadKnowledgeSources(dir: string): KeywordKnowledgeSource[] {
  if (!fs.existsSync(dir)) {
    logger.warn({ dir }, 'Knowledge directory not found');
    return [];
  }
  const sources = fs
    .readdirSync(dir)
    .filter((file) => /\.ya?ml$/.test(file))
    .sort()
    .map((file) => KeywordKnowledgeSource.fromFile(path.join(dir, file)));
  logger.info(
    { dir, sources: sources.map((s) => ({ name: s.name, entries: s.size })) },
    'Knowledge sources loaded',
  );
  return sources;
}
