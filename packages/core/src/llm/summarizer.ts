/**
 * Conversation summarizer backed by Claude
 */

import type { Summarizer, SummaryResult } from '../types/index.js';

import { ClaudeClient } from './client.js';

/** Output cap for one summary */
export const SUMMARY_MAX_TOKENS = 200;

/** Slight variety in wording without drifting from the transcript */
export const SUMMARY_TEMPERATURE = 0.3;

/**
 * Default summary instructions; `{persona_name}` is replaced with the persona
 */
export const DEFAULT_SUMMARY_SYSTEM_PROMPT =
  'You are {persona_name}. Write a brief, informative summary of the following dialogue ' +
  '(2-4 sentences), keeping the key topics, the emotional tone and important details. ' +
  'Speak in your own voice ({persona_name}).';

export function formatPersonaName(persona: string): string {
  return persona
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

export function buildSummaryUserMessage(transcript: string): string {
  return `Dialogue:\n${transcript}\n\nSummary:`;
}

export interface ClaudeSummarizerOptions {
  /** Per-persona replacements for the default system prompt */
  systemPrompts?: Record<string, string>;
  maxTokens?: number;
}

export class ClaudeSummarizer implements Summarizer {
  constructor(
    private client: ClaudeClient,
    private options: ClaudeSummarizerOptions = {}
  ) {}

  async createSummary(transcript: string, persona: string): Promise<SummaryResult> {
    const template = this.options.systemPrompts?.[persona] ?? DEFAULT_SUMMARY_SYSTEM_PROMPT;
    const systemPrompt = template.replaceAll('{persona_name}', formatPersonaName(persona));

    const response = await this.client.complete(systemPrompt, buildSummaryUserMessage(transcript), {
      maxTokens: this.options.maxTokens ?? SUMMARY_MAX_TOKENS,
      temperature: SUMMARY_TEMPERATURE,
    });

    if (!response.success) {
      return {
        success: false,
        error: {
          code: 'llm_error',
          message: response.error ?? 'Unknown error',
          retryable: response.retryable ?? false,
        },
      };
    }

    const summary = response.data?.trim() ?? '';
    if (!summary) {
      return {
        success: false,
        error: {
          code: 'empty_summary',
          message: 'Summarizer returned no text',
          retryable: true,
        },
      };
    }

    return { success: true, summary };
  }
}
