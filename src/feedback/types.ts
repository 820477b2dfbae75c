/**
 * Expert correction records awaiting knowledge-base ingestion.
 */

export interface CorrectionRecord {
  /** Equal to the query id: one correction per query */
  correctionId: string;
  queryId: string;
  conversationId: string;
  originalQuery: string;
  /** Candidate the drafted answer was built from */
  originalCandidate: {
    content: string;
    sourceId: string;
  } | null;
  /** The expert's replacement text; null for a rejection without one */
  finalText: string | null;
  outcome: 'edited' | 'rejected';
  expertId: string;
  recordedAt: number;
}

export interface CorrectionLedger {
  /** Append once per correction id; returns false if the id was already recorded */
  append(record: CorrectionRecord): Promise<boolean>;
  /** Records in append order, optionally only those recorded at or after `since` */
  list(since?: number): Promise<CorrectionRecord[]>;
}
