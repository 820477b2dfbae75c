import {
  fillPlaceholders,
  findTemplate,
  selectDelivery,
  truncateSlot,
} from '../../src/delivery/delivery-selector';
import { DeliveryContent, MessageTemplate } from '../../src/delivery/types';
import { NoTemplateAvailableError } from '../../src/errors/errors';

const templates: MessageTemplate[] = [
  { name: 'answer_v1', category: 'verified_answer', language: 'en', body: 'Answer: {{answer}} ({{internal}})', slots: ['answer'], maxSlotLength: 10 },
  { name: 'answer_v1', category: 'verified_answer', language: 'hi', body: 'उत्तर: {{answer}}', slots: ['answer'] },
  { name: 'generic_v1', category: 'generic', language: 'en', body: 'We have an update', slots: [] },
];

const content: DeliveryContent = {
  category: 'verified_answer',
  text: 'Rest well after each cycle.',
  slots: { answer: 'Rest well', internal: 'draft-7' },
};

describe('DeliverySelector', () => {
  it('should send the full text free-form while the window is open', () => {
    const decision = selectDelivery({ content, windowOpen: true, templates, locale: 'en', defaultLocale: 'en' });

    expect(decision).toEqual({
      representation: 'free_form',
      payload: { representation: 'free_form', text: 'Rest well after each cycle.' },
    });
  });

  it('should fill only whitelisted slots once the window has closed', () => {
    const decision = selectDelivery({ content, windowOpen: false, templates, locale: 'en', defaultLocale: 'en' });

    expect(decision.representation).toBe('template');
    expect(decision.templateError).toBeUndefined();
    expect(decision.payload).toEqual({
      representation: 'template',
      templateName: 'answer_v1',
      language: 'en',
      variables: { answer: 'Rest well' },
      preview: 'Answer: Rest well ()',
    });
  });

  it('should truncate slot values to the template maximum', () => {
    const long = { ...content, slots: { answer: 'Drink plenty of water' } };

    const decision = selectDelivery({ content: long, windowOpen: false, templates, locale: 'en', defaultLocale: 'en' });

    expect(decision.payload).toMatchObject({ variables: { answer: 'Drink ple…' } });
  });

  it('should prefer the conversation locale', () => {
    const decision = selectDelivery({ content, windowOpen: false, templates, locale: 'hi', defaultLocale: 'en' });

    expect(decision.payload).toMatchObject({ language: 'hi', preview: 'उत्तर: Rest well' });
  });

  it('should fall back to the default locale', () => {
    const decision = selectDelivery({ content, windowOpen: false, templates, locale: 'fr', defaultLocale: 'en' });

    expect(decision.payload).toMatchObject({ language: 'en', templateName: 'answer_v1' });
  });

  it('should use the generic template and report the missing category', () => {
    const still: DeliveryContent = { category: 'still_working', text: 'Still on it', slots: {} };

    const decision = selectDelivery({ content: still, windowOpen: false, templates, locale: 'en', defaultLocale: 'en' });

    expect(decision.payload).toEqual({
      representation: 'template',
      templateName: 'generic_v1',
      language: 'en',
      variables: {},
      preview: 'We have an update',
    });
    expect(decision.templateError).toBeInstanceOf(NoTemplateAvailableError);
    expect(decision.templateError?.category).toBe('still_working');
  });

  it('should throw when not even a generic template exists', () => {
    const still: DeliveryContent = { category: 'still_working', text: 'Still on it', slots: {} };

    expect(() => selectDelivery({ content: still, windowOpen: false, templates: templates.slice(0, 2), locale: 'en', defaultLocale: 'en' }))
      .toThrow(NoTemplateAvailableError);
  });

  describe('helpers', () => {
    it('should fill placeholders with optional inner spaces', () => {
      expect(fillPlaceholders('Hi {{ name }}, see {{answer}}', (n) => n.toUpperCase())).toBe('Hi NAME, see ANSWER');
    });

    it('should truncate with an ellipsis only past the limit', () => {
      expect(truncateSlot('abcdef', 6)).toBe('abcdef');
      expect(truncateSlot('abcdefg', 6)).toBe('abcde…');
      expect(truncateSlot('abc', 1)).toBe('a');
      expect(truncateSlot('abc')).toBe('abc');
    });

    it('should find any language when neither locale matches', () => {
      expect(findTemplate(templates.slice(1), 'verified_answer', 'fr', 'en')?.language).toBe('hi');
      expect(findTemplate(templates, 'unknown', 'en', 'en')).toBeUndefined();
    });
  });
});
