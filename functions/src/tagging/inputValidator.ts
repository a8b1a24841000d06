import type { EventRecord } from '../models/event';
import type { InputValidator } from '../models/tagging';
import { cleanText } from '../utils/text';
import { ValidationError } from './errors';

const MIN_TITLE_LENGTH = 3;

export class EventInputValidator implements InputValidator {
  private readonly sensitiveKeywords: string[];

  constructor(options?: { sensitiveKeywords?: string[] }) {
    this.sensitiveKeywords = (options?.sensitiveKeywords ?? [])
      .map(keyword => keyword.trim().toLowerCase())
      .filter(keyword => keyword.length > 0);
  }

  validate(record: EventRecord): EventRecord {
    const id = record.id.trim();
    if (!id) {
      throw new ValidationError('Event id is required');
    }

    const title = cleanText(record.title);
    if (title.length < MIN_TITLE_LENGTH) {
      throw new ValidationError(`Event title must be at least ${MIN_TITLE_LENGTH} characters`);
    }

    const cleaned: EventRecord = {
      id,
      title,
      organizer: cleanOptional(record.organizer),
      subtype: cleanOptional(record.subtype),
      teaser: cleanOptional(record.teaser),
      description: cleanOptional(record.description),
    };

    const keyword = this.findSensitiveKeyword(cleaned);
    if (keyword) {
      throw new ValidationError(`Event contains sensitive content: ${keyword}`);
    }

    return Object.freeze(cleaned);
  }

  private findSensitiveKeyword(record: EventRecord): string | null {
    if (this.sensitiveKeywords.length === 0) {
      return null;
    }

    const haystack = [record.title, record.teaser, record.description]
      .filter(Boolean)
      .join(' ')
      .toLowerCase();

    return this.sensitiveKeywords.find(keyword => haystack.includes(keyword)) ?? null;
  }
}

function cleanOptional(value: string | null | undefined): string | null {
  const cleaned = cleanText(value);
  return cleaned.length > 0 ? cleaned : null;
}
