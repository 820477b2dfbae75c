/**
 * Delivery Selector
 *
 * Chooses how a message goes out. Inside the provider's free-form window the
 * text is sent as is; outside it only a pre-approved template may be sent,
 * with nothing but its whitelisted slots filled in. Pure: no I/O, no clock.
 */

import { NoTemplateAvailableError } from '../errors/errors';
import {
  DeliveryDecision,
  GENERIC_TEMPLATE_CATEGORY,
  MessageTemplate,
  SelectDeliveryInput,
} from './types';

const PLACEHOLDER = /\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g;

/** Replace every `{{name}}` in `body` with `resolve(name)` */
export function fillPlaceholders(body: string, resolve: (name: string) => string): string {
  return body.replace(PLACEHOLDER, (_match, name: string) => resolve(name));
}

export function truncateSlot(value: string, maxLength?: number): string {
  if (maxLength === undefined || value.length <= maxLength) return value;
  if (maxLength <= 1) return value.slice(0, maxLength);
  return `${value.slice(0, maxLength - 1)}…`;
}

/**
 * Nearest template of a category: the requested locale first, then the
 * default locale, then any language.
 */
export function findTemplate(
  templates: readonly MessageTemplate[],
  category: string,
  locale: string,
  defaultLocale: string,
): MessageTemplate | undefined {
  const candidates = templates.filter((t) => t.category === category);
  return (
    candidates.find((t) => t.language === locale) ??
    candidates.find((t) => t.language === defaultLocale) ??
    candidates[0]
  );
}

export function renderTemplate(
  template: MessageTemplate,
  values: Record<string, string>,
): { variables: Record<string, string>; preview: string } {
  const variables: Record<string, string> = {};
  for (const slot of template.slots) {
    variables[slot] = truncateSlot(values[slot] ?? '', template.maxSlotLength);
  }
  const preview = fillPlaceholders(template.body, (name) => variables[name] ?? '');
  return { variables, preview };
}

export function selectDelivery(input: SelectDeliveryInput): DeliveryDecision {
  const { content, windowOpen, templates, locale, defaultLocale } = input;

  if (windowOpen) {
    return {
      representation: 'free_form',
      payload: { representation: 'free_form', text: content.text },
    };
  }

  let templateError: NoTemplateAvailableError | undefined;
  let template = findTemplate(templates, content.category, locale, defaultLocale);
  if (!template) {
    templateError = new NoTemplateAvailableError(content.category, locale);
    template = findTemplate(templates, GENERIC_TEMPLATE_CATEGORY, locale, defaultLocale);
    if (!template) {
      // the registry refuses to load without one
      throw new NoTemplateAvailableError(GENERIC_TEMPLATE_CATEGORY, locale);
    }
  }

  const { variables, preview } = renderTemplate(template, content.slots);
  return {
    representation: 'template',
    payload: {
      representation: 'template',
      templateName: template.name,
      language: template.language,
      variables,
      preview,
    },
    templateError,
  };
}
