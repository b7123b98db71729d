import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { extractTextContent, normalizeMessages } from '../src/normalizer.js';
import type { ChatMessage } from '../src/types.js';

const user = (content: string): ChatMessage => ({ role: 'user', content });
const assistant = (content: string): ChatMessage => ({ role: 'assistant', content });
const system = (content: string): ChatMessage => ({ role: 'system', content });

describe('extractTextContent', () => {
  it('returns plain strings unchanged', () => {
    expect(extractTextContent('hello')).toBe('hello');
  });

  it('joins text parts with a space and drops other parts', () => {
    expect(
      extractTextContent([
        { type: 'text', text: 'look at' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA' } },
        { type: 'text', text: 'this' },
      ]),
    ).toBe('look at this');
  });
});

describe('normalizeMessages', () => {
  it('accepts a single user message', () => {
    expect(normalizeMessages([user('hi')])).toEqual({ query: 'hi', history: [] });
  });

  it('rejects an empty list', () => {
    expect(() => normalizeMessages([])).toThrow(ValidationError);
    expect(() => normalizeMessages([])).toThrow('No messages provided');
  });

  it('rejects a list that does not end with a user message', () => {
    expect(() => normalizeMessages([user('hi'), assistant('hello')])).toThrow('Last message must be from user');
    expect(() => normalizeMessages([system('be brief')])).toThrow(ValidationError);
  });

  it('merges a leading system message into the query', () => {
    const result = normalizeMessages([system('be brief'), user('why?')]);
    expect(result.history).toEqual([]);
    expect(result.query).toBe('[system prompt]:\nbe brief\n\n[user question]:\nwhy?');
  });

  it('builds aligned history pairs', () => {
    const result = normalizeMessages([user('u1'), assistant('a1'), user('u2'), assistant('a2'), user('u3')]);
    expect(result.query).toBe('u3');
    expect(result.history).toEqual([
      { user: 'u1', assistant: 'a1' },
      { user: 'u2', assistant: 'a2' },
    ]);
  });

  it('pairs history after the system message', () => {
    const result = normalizeMessages([system('s'), user('u1'), assistant('a1'), user('u2')]);
    expect(result.history).toEqual([{ user: 'u1', assistant: 'a1' }]);
    expect(result.query).toBe('[system prompt]:\ns\n\n[user question]:\nu2');
  });

  it('skips a misaligned pair without realigning the rest', () => {
    // (u1, u2) is skipped; (a2, u3) is skipped too since the stride stays at 2
    const result = normalizeMessages([user('u1'), user('u2'), assistant('a2'), user('u3'), user('u4')]);
    expect(result.history).toEqual([]);

    const later = normalizeMessages([user('u1'), user('u2'), user('u3'), assistant('a3'), user('u4')]);
    expect(later.history).toEqual([{ user: 'u3', assistant: 'a3' }]);
  });

  it('ignores a trailing unpaired message before the query', () => {
    const result = normalizeMessages([user('u1'), assistant('a1'), user('dangling'), user('u2')]);
    expect(result.history).toEqual([{ user: 'u1', assistant: 'a1' }]);
  });

  it('only treats the first message as the system prompt', () => {
    const result = normalizeMessages([user('u1'), system('late'), user('u2')]);
    expect(result.query).toBe('u2');
    expect(result.history).toEqual([]);
  });
});
