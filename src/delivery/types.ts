import { DeliveryKind, DeliveryRepresentation } from '../config/types';
import { NoTemplateAvailableError } from '../errors/errors';

/** Messages the engine sends: user deliveries plus expert-facing review notices */
export type MessageKey =
  | DeliveryKind
  | 'duplicate_pending'
  | 'user_reminder'
  | 'review_request'
  | 'review_reminder'
  | 'review_escalation'
  | 'review_digest';

export const MESSAGE_KEYS: readonly MessageKey[] = [
  'verified_answer',
  'corrected_answer',
  'rejected_answer',
  'no_answer',
  'still_working',
  'duplicate_pending',
  'user_reminder',
  'review_request',
  'review_reminder',
  'review_escalation',
  'review_digest',
];

/** Template category used when no template matches the content category */
export const GENERIC_TEMPLATE_CATEGORY = 'generic';

/** Pre-approved provider template */
export interface MessageTemplate {
  name: string;
  category: string;
  language: string;
  /** Body with `{{slot}}` placeholders */
  body: string;
  /** Slots that may be filled; any other placeholder renders empty */
  slots: string[];
  maxSlotLength?: number;
}

/** What to say, before a representation is chosen */
export interface DeliveryContent {
  category: string;
  /** Full free-form text */
  text: string;
  /** Values offered to template slots */
  slots: Record<string, string>;
}

export type RenderedPayload =
  | { representation: 'free_form'; text: string }
  | {
      representation: 'template';
      templateName: string;
      language: string;
      variables: Record<string, string>;
      /** Body with the variables substituted, for logs and audit */
      preview: string;
    };

export interface SelectDeliveryInput {
  content: DeliveryContent;
  windowOpen: boolean;
  templates: readonly MessageTemplate[];
  locale: string;
  defaultLocale: string;
}

export interface DeliveryDecision {
  representation: DeliveryRepresentation;
  payload: RenderedPayload;
  /** Set when the content category had no template and the generic one was used */
  templateError?: NoTemplateAvailableError;
}
