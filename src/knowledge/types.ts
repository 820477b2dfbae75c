import { KnowledgeCandidate } from '../config/types';

export interface KnowledgeSearchOptions {
  topK: number;
  locale?: string;
  signal?: AbortSignal;
}

/** What the engine consumes: one ranked list, whatever the number of sources */
export interface KnowledgeRetriever {
  /** Rejects with RetrievalUnavailableError */
  search(text: string, options: KnowledgeSearchOptions): Promise<KnowledgeCandidate[]>;
}

/** One knowledge base behind the retriever */
export interface KnowledgeSource {
  readonly name: string;
  search(text: string, options: KnowledgeSearchOptions): Promise<KnowledgeCandidate[]>;
}

export interface FAQEntry {
  id: string;
  question: string;
  answer: string;
  tags: string[];
  category: string;
  /** Absent means every locale */
  locale?: string;
}
