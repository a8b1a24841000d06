import { randomUUID } from 'crypto';
import type { DatasetEntry, EventRecord } from '../models/event';
import { toTagName } from '../utils/text';

export const MAX_BATCH_SIZE = 100;

export interface TagRequestOptions {
  includeReasoning: boolean;
  requireConfidence: boolean;
}

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Body, field: string): string | null {
  const value = body[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a string when provided`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function optionalBoolean(body: Body, field: string, fallback: boolean): boolean {
  const value = body[field];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${field} must be a boolean when provided`);
  }
  return value;
}

export function parseEventRecord(value: unknown, fieldName = 'body'): EventRecord {
  if (!isBody(value)) {
    throw new Error(`${fieldName} must be an object`);
  }

  const title = value.title;
  if (typeof title !== 'string' || title.trim().length === 0) {
    throw new Error('title is required and must be a string');
  }

  return {
    id: optionalString(value, 'id') ?? randomUUID(),
    title: title.trim(),
    organizer: optionalString(value, 'organizer'),
    subtype: optionalString(value, 'subtype'),
    teaser: optionalString(value, 'teaser'),
    description: optionalString(value, 'description'),
  };
}

export function parseTagRequest(value: unknown): { record: EventRecord; options: TagRequestOptions } {
  const record = parseEventRecord(value);
  const body = isBody(value) ? value : {};
  return {
    record,
    options: {
      includeReasoning: optionalBoolean(body, 'includeReasoning', true),
      requireConfidence: optionalBoolean(body, 'requireConfidence', true),
    },
  };
}

export function parseBatchRequest(value: unknown): { records: EventRecord[]; options: TagRequestOptions } {
  if (!isBody(value) || !Array.isArray(value.events)) {
    throw new Error('events must be an array');
  }
  if (value.events.length === 0 || value.events.length > MAX_BATCH_SIZE) {
    throw new Error(`events must contain between 1 and ${MAX_BATCH_SIZE} items`);
  }

  const records = value.events.map((event, index) => parseEventRecord(event, `events[${index}]`));
  const ids = new Set(records.map(record => record.id));
  if (ids.size !== records.length) {
    throw new Error('event ids must be unique');
  }

  return {
    records,
    options: {
      includeReasoning: optionalBoolean(value, 'includeReasoning', true),
      requireConfidence: optionalBoolean(value, 'requireConfidence', true),
    },
  };
}

export type EvaluationRequest =
  | { kind: 'dataset'; dataset: string | null }
  | { kind: 'inline'; entries: DatasetEntry[] };

export function parseEvaluationRequest(value: unknown): EvaluationRequest {
  const body = isBody(value) ? value : {};

  if (body.testEvents === undefined) {
    return { kind: 'dataset', dataset: optionalString(body, 'dataset') };
  }

  if (!Array.isArray(body.testEvents) || body.testEvents.length === 0) {
    throw new Error('testEvents must be a non-empty array');
  }

  const entries = body.testEvents.map((item, index): DatasetEntry => {
    if (!isBody(item)) {
      throw new Error(`testEvents[${index}] must be an object`);
    }
    const event = parseEventRecord(item.event, `testEvents[${index}].event`);
    const rawTags = item.groundTruthTags;
    if (!Array.isArray(rawTags) || rawTags.some(tag => typeof tag !== 'string')) {
      throw new Error(`testEvents[${index}].groundTruthTags must be an array of strings`);
    }
    const tags = Array.from(new Set(rawTags.map(tag => toTagName(String(tag))).filter(tag => tag.length > 0)));
    if (tags.length === 0 || tags.length > 3) {
      throw new Error(`testEvents[${index}].groundTruthTags must contain between 1 and 3 tags`);
    }
    return { event, groundTruth: { eventId: event.id, tags } };
  });

  return { kind: 'inline', entries };
}

export function parseSubmissionRequest(value: unknown): { name: string; dataset: string | null } {
  const body = isBody(value) ? value : {};
  const name = optionalString(body, 'name');
  if (!name) {
    throw new Error('name is required');
  }
  return { name, dataset: optionalString(body, 'dataset') };
}
