/**
 * Answer Composer
 *
 * Turns a ranked retrieval result into the draft answer an expert verifies
 * and the review packet they are shown. Never touches conversation state.
 */

import { KnowledgeCandidate } from '../config/types';

export interface Draft {
  chosen: KnowledgeCandidate;
  draftAnswer: string;
}

const MAX_QUERY_LENGTH = 2000;

/** Text used for retrieval: Unicode-normalized, single-spaced, lowercased */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFKC')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .slice(0, MAX_QUERY_LENGTH);
}

export class AnswerComposer {
  /** Drafts from the top-ranked candidate; null when there is nothing to draft from */
  draft(candidates: readonly KnowledgeCandidate[]): Draft | null {
    const chosen = candidates.find((c) => c.content.trim().length > 0);
    if (!chosen) return null;
    return { chosen, draftAnswer: chosen.content.trim() };
  }

  /** What the expert is shown for one review */
  reviewPacket(question: string, draftAnswer: string): string {
    return `Question: ${question}\nBot_Answer: ${draftAnswer}\nIs the answer correct?`;
  }
}
