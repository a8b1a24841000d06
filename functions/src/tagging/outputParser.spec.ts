import assert from 'node:assert/strict';
import test from 'node:test';
import { JsonTagOutputParser } from './outputParser';

const parser = new JsonTagOutputParser();
const AVAILABLE = ['CONCERT', 'KIDS_ACTIVITIES', 'LECTURE'];

test('parse normalizes tags and reads confidence and reasoning', () => {
  const result = parser.parse(
    '{"tag1": "concert", "tag2": "Kids Activities", "tag3": "", "confidence": 0.82, "reasoning": " Live music "}',
    AVAILABLE,
  );

  assert.deepEqual(result, {
    tags: ['CONCERT', 'KIDS_ACTIVITIES'],
    confidence: 0.82,
    reasoning: 'Live music',
    isValid: true,
  });
});

test('parse accepts fenced output, upper-case keys and string confidence', () => {
  const result = parser.parse('```json\n{"TAG1": "LECTURE", "confidence": "0.6"}\n```', AVAILABLE);

  assert.deepEqual(result.tags, ['LECTURE']);
  assert.equal(result.confidence, 0.6);
  assert.equal(result.reasoning, '');
  assert.equal(result.isValid, true);
});

test('parse finds the object inside surrounding prose', () => {
  const result = parser.parse('Sure! {"tag1": "LECTURE", "confidence": 0.9} Hope this helps', AVAILABLE);
  assert.deepEqual(result.tags, ['LECTURE']);
  assert.equal(result.confidence, 0.9);
});

test('parse drops repeated tags', () => {
  const result = parser.parse('{"tag1": "CONCERT", "tag2": "concert", "confidence": 0.7}', AVAILABLE);
  assert.deepEqual(result.tags, ['CONCERT']);
});

test('parse treats an unreadable confidence as 0', () => {
  const result = parser.parse('{"tag1": "CONCERT", "confidence": "high"}', AVAILABLE);
  assert.equal(result.confidence, 0);
  assert.equal(result.isValid, true);
});

test('parse rejects tags outside the taxonomy', () => {
  const result = parser.parse('{"tag1": "CONCERT", "tag2": "Opera"}', AVAILABLE);

  assert.deepEqual(result, {
    tags: [],
    confidence: 0,
    reasoning: '',
    isValid: false,
    error: 'TAG2 "Opera" is not an available tag',
  });
});

test('parse rejects an empty tag1 instead of promoting tag2', () => {
  const result = parser.parse('{"tag1": "", "tag2": "CONCERT", "confidence": 0.9}', AVAILABLE);

  assert.deepEqual(result, {
    tags: [],
    confidence: 0,
    reasoning: '',
    isValid: false,
    error: 'No valid tag1 found in response',
  });
  assert.equal(parser.parse('{"tag2": "LECTURE", "tag3": "CONCERT"}', AVAILABLE).error, 'No valid tag1 found in response');
  assert.equal(parser.parse('{"tag1": null, "tag2": "LECTURE"}', AVAILABLE).isValid, false);
});

test('parse skips empty tag2 while keeping tag3', () => {
  const result = parser.parse('{"tag1": "LECTURE", "tag2": "", "tag3": "CONCERT", "confidence": 0.8}', AVAILABLE);
  assert.deepEqual(result.tags, ['LECTURE', 'CONCERT']);
});

test('parse rejects non-string tags', () => {
  assert.equal(parser.parse('{"tag1": 5}', AVAILABLE).error, 'TAG1 must be a string');
});

test('parse reports malformed responses without throwing', () => {
  assert.equal(parser.parse('   ', AVAILABLE).error, 'Empty response from model');
  assert.equal(parser.parse('no json here', AVAILABLE).error, 'Could not parse JSON: no object found in response');
  assert.match(parser.parse('{"tag1": }', AVAILABLE).error ?? '', /^Could not parse JSON: /);
  assert.equal(parser.parse('{"tag2": ""}', AVAILABLE).error, 'No valid tag1 found in response');
});
