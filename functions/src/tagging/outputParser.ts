import type { OutputParser, ParsedTagResult } from '../models/tagging';
import { toTagName } from '../utils/text';

const MAX_TAGS = 3;
const TAG_KEYS = ['tag1', 'tag2', 'tag3'] as const;

export function invalidResult(error: string): ParsedTagResult {
  return { tags: [], confidence: 0, reasoning: '', isValid: false, error };
}

/**
 * Reads the JSON object the model was asked for. Anything unexpected is
 * reported through `isValid: false`; this parser never throws.
 */
export class JsonTagOutputParser implements OutputParser {
  parse(content: string, availableTags: readonly string[]): ParsedTagResult {
    const data = extractJsonObject(content);
    if (typeof data === 'string') {
      return invalidResult(data);
    }

    const allowed = new Set(availableTags);
    const tags: string[] = [];

    for (const key of TAG_KEYS) {
      const raw = readField(data, key);
      let tag = '';
      if (typeof raw === 'string') {
        tag = toTagName(raw);
      } else if (raw !== undefined && raw !== null) {
        return invalidResult(`${key.toUpperCase()} must be a string`);
      }

      // tag2 and tag3 never move up into an empty tag1 slot.
      if (!tag && key === 'tag1') {
        return invalidResult('No valid tag1 found in response');
      }
      if (!tag || tags.includes(tag)) {
        continue;
      }
      if (!allowed.has(tag)) {
        return invalidResult(`${key.toUpperCase()} "${raw}" is not an available tag`);
      }
      tags.push(tag);
    }

    const reasoning = readField(data, 'reasoning');

    return {
      tags: tags.slice(0, MAX_TAGS),
      confidence: readConfidence(readField(data, 'confidence')),
      reasoning: typeof reasoning === 'string' ? reasoning.trim() : '',
      isValid: true,
    };
  }
}

function extractJsonObject(content: string): Record<string, unknown> | string {
  const text = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  if (!text) {
    return 'Empty response from model';
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return 'Could not parse JSON: no object found in response';
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    return `Could not parse JSON: ${error instanceof Error ? error.message : 'unknown error'}`;
  }

  if (!isRecord(parsed)) {
    return 'Could not parse JSON: response is not an object';
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Models echo keys in either case ("TAG1" or "tag1").
function readField(data: Record<string, unknown>, key: string): unknown {
  if (key in data) {
    return data[key];
  }
  const upper = key.toUpperCase();
  if (upper in data) {
    return data[upper];
  }
  const match = Object.keys(data).find(candidate => candidate.toLowerCase() === key);
  return match === undefined ? undefined : data[match];
}

function readConfidence(value: unknown): number {
  const parsed = typeof value === 'number'
    ? value
    : typeof value === 'string'
      ? Number.parseFloat(value)
      : Number.NaN;
  return Number.isFinite(parsed) ? parsed : 0;
}
