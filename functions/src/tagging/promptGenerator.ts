import type { EventRecord } from '../models/event';
import type { PromptGenerator, PromptPayload } from '../models/tagging';
import type { TagRegistry } from './tagRegistry';

const MAX_EXAMPLES_PER_TAG = 3;

export class TaxonomyPromptGenerator implements PromptGenerator {
  constructor(private readonly registry: TagRegistry) {}

  generate(record: EventRecord, availableTags: readonly string[]): PromptPayload {
    return {
      prompt: this.buildPrompt(record, availableTags),
      availableTags,
    };
  }

  private buildPrompt(record: EventRecord, availableTags: readonly string[]): string {
    const descriptionLines = [
      record.teaser ? `Teaser: ${record.teaser}` : null,
      record.description ? `Description: ${record.description}` : null,
    ].filter((line): line is string => line !== null);

    const tagLines = availableTags.map(tag => {
      const rule = this.registry.get(tag);
      if (!rule) {
        return `- ${tag}`;
      }
      const description = rule.description ? `: ${rule.description}` : '';
      const examples = rule.examples.slice(0, MAX_EXAMPLES_PER_TAG).join(', ');
      return examples
        ? `- ${tag} (${rule.displayName})${description} Examples: ${examples}`
        : `- ${tag} (${rule.displayName})${description}`;
    });

    return [
      'You assign taxonomy tags to events.',
      '',
      'Event to tag:',
      `Title: ${record.title}`,
      `Organizer: ${record.organizer ?? 'Not specified'}`,
      `Type: ${record.subtype ?? 'Not specified'}`,
      ...(descriptionLines.length > 0 ? descriptionLines : ['No description available.']),
      '',
      'Available tags:',
      ...tagLines,
      '',
      'Instructions:',
      '- Choose between 1 and 3 tags, most likely first.',
      '- Use tag names exactly as listed (upper case, underscores instead of spaces).',
      '- Use an empty string for tag2 and tag3 when fewer tags apply.',
      '- confidence is a number between 0 and 1 for tag1.',
      '',
      'Respond with JSON only:',
      '{"tag1": "TAG_NAME", "tag2": "TAG_NAME" | "", "tag3": "TAG_NAME" | "", "confidence": 0.0-1.0, "reasoning": "One or two sentences"}',
    ].join('\n');
  }
}
