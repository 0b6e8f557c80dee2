/**
 * Approximate Token Counter Tests
 */

import { describe, it, expect } from 'vitest';

import { ApproximateTokenCounter, detectLanguage } from './tokens.js';

const CLAUDE = 'claude-3-5-haiku-20241022';

describe('detectLanguage', () => {
  it('classifies mostly Latin text as english', () => {
    expect(detectLanguage('hello world')).toBe('english');
  });

  it('classifies mostly Cyrillic text as russian', () => {
    expect(detectLanguage('Привет, как дела?')).toBe('russian');
  });

  it('classifies balanced text as mixed', () => {
    expect(detectLanguage('Hello мир')).toBe('mixed');
  });

  it('classifies text without letters as mixed', () => {
    expect(detectLanguage('12345')).toBe('mixed');
  });
});

describe('ApproximateTokenCounter', () => {
  const counter = new ApproximateTokenCounter();

  it('returns zero for empty text', () => {
    expect(counter.count('', CLAUDE)).toBe(0);
  });

  it('returns at least one token for any text', () => {
    expect(counter.count('a', CLAUDE)).toBe(1);
  });

  it('uses the english ratio for Latin text', () => {
    expect(counter.count('hello world', CLAUDE)).toBe(2);
  });

  it('adds punctuation and short-word corrections for Cyrillic text', () => {
    expect(counter.count('Привет, как дела?', CLAUDE)).toBe(6);
  });

  it('falls back to the default ratio for unknown models', () => {
    expect(counter.count('hello world', 'gemini-pro')).toBe(3);
  });

  it('is deterministic', () => {
    const text = 'Remember the picnic on Saturday?\nYes!\nIt rained.';

    expect(counter.count(text, CLAUDE)).toBe(counter.count(text, CLAUDE));
  });

  it('adds role and per-message overhead when counting messages', () => {
    expect(counter.countMessages([{ role: 'user', content: 'hello world' }], CLAUDE)).toBe(6);
  });

  it('can be used as a TokenCounter', () => {
    const countTokens = counter.asTokenCounter();

    expect(countTokens('hello world', CLAUDE)).toBe(2);
  });
});
