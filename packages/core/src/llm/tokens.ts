/**
 * Approximate token counting
 *
 * Character-ratio estimation for budget checks before a request is sent.
 * Ratios depend on the model family and on whether the text is mostly
 * Cyrillic, mostly Latin, or a mix of both. Actual usage should come from
 * the API response.
 */

import type { TokenCounter, WireMessage } from '../types/index.js';

import type { TextLanguage } from './types.js';

type ModelFamily = 'claude' | 'openai';

/** Tokens per character, by model family and detected language */
const CHAR_TO_TOKEN_RATIOS: Record<ModelFamily, Record<TextLanguage, number>> = {
  claude: { russian: 0.3, english: 0.25, mixed: 0.28 },
  openai: { russian: 0.35, english: 0.25, mixed: 0.3 },
};

/** Ratio for models outside the known families */
const DEFAULT_CHAR_TO_TOKEN_RATIO = 0.3;

/** Role markup and separators cost a few tokens per message */
const TOKENS_PER_MESSAGE_OVERHEAD = 3;

const CYRILLIC_PATTERN = /[а-яё]/giu;
const LATIN_PATTERN = /[a-z]/gi;
const SPECIAL_CHAR_PATTERN = /[^\p{L}\p{N}_\s]/gu;
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const LINE_BREAK_PATTERN = /\n\s*/g;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function modelFamily(model: string): ModelFamily | null {
  const normalized = model.trim().toLowerCase();
  if (normalized.startsWith('claude')) {
    return 'claude';
  }
  if (normalized.startsWith('gpt') || normalized.startsWith('openai')) {
    return 'openai';
  }
  return null;
}

/**
 * Classify text as mostly Cyrillic, mostly Latin, or mixed
 */
export function detectLanguage(text: string): TextLanguage {
  const cyrillic = countMatches(text, CYRILLIC_PATTERN);
  const latin = countMatches(text, LATIN_PATTERN);
  const total = cyrillic + latin;

  if (total === 0) {
    return 'mixed';
  }

  const cyrillicRatio = cyrillic / total;
  if (cyrillicRatio > 0.7) {
    return 'russian';
  }
  if (cyrillicRatio < 0.3) {
    return 'english';
  }
  return 'mixed';
}

/**
 * Adjust a ratio-based estimate for punctuation density, short words and
 * heavily line-broken text, all of which tokenise worse than prose.
 */
function applyCorrections(text: string, baseEstimate: number, language: TextLanguage): number {
  let corrected = baseEstimate;

  const specialChars = countMatches(text, SPECIAL_CHAR_PATTERN);
  if (specialChars > text.length * 0.05) {
    corrected = Math.floor(corrected * 1.05 + specialChars * 0.5);
  }

  const words = text.match(WORD_PATTERN) ?? [];
  if (words.length > 0) {
    const shortWords = words.filter((word) => [...word].length <= 3).length;
    if (language === 'russian' && shortWords > words.length * 0.25) {
      corrected = Math.floor(corrected * 1.03);
    } else if (language === 'english' && shortWords > words.length * 0.35) {
      corrected = Math.floor(corrected * 1.02);
    }
  }

  if (text.includes('\n') && countMatches(text, LINE_BREAK_PATTERN) > 5) {
    corrected = Math.floor(corrected * 1.02);
  }

  return Math.max(0, corrected);
}

/**
 * Ratio-based token estimator
 */
export class ApproximateTokenCounter {
  /**
   * Estimate tokens for a piece of text; 0 for empty text, otherwise at least 1
   */
  count(text: string, model: string): number {
    if (!text) {
      return 0;
    }

    const language = detectLanguage(text);
    const family = modelFamily(model);
    const ratio = family ? CHAR_TO_TOKEN_RATIOS[family][language] : DEFAULT_CHAR_TO_TOKEN_RATIO;
    const estimate = Math.floor([...text].length * ratio);

    return Math.max(1, applyCorrections(text, estimate, language));
  }

  /**
   * Estimate tokens for a message list including role and per-message overhead
   */
  countMessages(messages: WireMessage[], model: string): number {
    return messages.reduce(
      (total, message) =>
        total +
        this.count(message.content, model) +
        this.count(message.role, model) +
        TOKENS_PER_MESSAGE_OVERHEAD,
      0
    );
  }

  /**
   * Bind as a TokenCounter for the context assembler
   */
  asTokenCounter(): TokenCounter {
    return (content, model) => this.count(content, model);
  }
}
