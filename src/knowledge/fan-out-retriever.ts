import { KnowledgeCandidate } from '../config/types';
import { KnowledgeRetriever, KnowledgeSearchOptions, KnowledgeSource } from './types';
import { RetrievalUnavailableError } from '../errors/errors';
import { logger } from '../observability/logger';

export interface FanOutOptions {
  /** Candidates scoring below this are dropped */
  minScore: number;
}

/**
 * Queries every source in parallel and merges the results into one ranked
 * list. A failing source is logged and left out; retrieval is unavailable
 * only when every source fails.
 */
export class FanOutRetriever implements KnowledgeRetriever {
  private readonly log = logger.child({ component: 'fan-out-retriever' });

  constructor(private readonly sources: readonly KnowledgeSource[], private readonly options: FanOutOptions) {}

  async search(text: string, options: KnowledgeSearchOptions): Promise<KnowledgeCandidate[]> {
    if (this.sources.length === 0) {
      throw new RetrievalUnavailableError('No knowledge sources configured');
    }
    if (options.signal?.aborted) {
      throw new RetrievalUnavailableError('Retrieval aborted');
    }

    const settled = await Promise.allSettled(this.sources.map((source) => source.search(text, options)));

    const merged = new Map<string, KnowledgeCandidate>();
    let failures = 0;
    settled.forEach((result, i) => {
      if (result.status === 'rejected') {
        failures++;
        this.log.warn({ err: result.reason, source: this.sources[i].name }, 'Knowledge source failed');
        return;
      }
      for (const candidate of result.value) {
        if (candidate.score < this.options.minScore) continue;
        const existing = merged.get(candidate.sourceId);
        if (!existing || candidate.score > existing.score) {
          merged.set(candidate.sourceId, candidate);
        }
      }
    });

    if (failures === this.sources.length) {
      throw new RetrievalUnavailableError('All knowledge sources failed');
    }

    return Array.from(merged.values())
      .sort((a, b) => b.score - a.score || a.sourceId.localeCompare(b.sourceId))
      .slice(0, options.topK);
  }
}
