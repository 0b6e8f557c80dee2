/**
 * Context assembler
 *
 * Builds the ordered role/content list handed to the language model for one
 * reply. The read path is normalise → summaries → memories → sliding window →
 * token budget. When a stage throws, the assembler degrades through a fixed
 * list of simpler strategies; callers always receive a usable context.
 */

import { CONTEXT_UNAVAILABLE_MESSAGE } from '../constants.js';
import type { Logger } from '../logger.js';
import { StructuredLogger, toError } from '../logger.js';
import type {
  ContextConfig,
  RawMessageRecord,
  Summarizer,
  SummaryStore,
  TokenCounter,
  WireMessage,
} from '../types/index.js';

import { resolveContextConfig } from './config.js';
import { injectMemories } from './memory-injector.js';
import { normalizeMessages } from './message-normalizer.js';
import { applySlidingWindow, toWireMessages } from './sliding-window.js';
import { injectSummaries } from './summary-injector.js';
import { SummaryTrigger } from './summary-trigger.js';
import { optimizeForTokenBudget } from './token-budget.js';

/** Upper bound on summaries read when reporting statistics */
const STATS_SUMMARY_SCAN_LIMIT = 1000;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ContextAssemblerDeps {
  summaryStore: SummaryStore;
  countTokens: TokenCounter;
  logger?: Logger;
  config?: Partial<ContextConfig>;
}

export interface PrepareContextRequest {
  userId: string;
  persona: string;
  /** Persisted history for the pair, oldest first */
  rawMessages: RawMessageRecord[];
  /** Pre-ranked long-term memories, most relevant first */
  relevantMemories?: readonly string[];
}

export interface ContextStats {
  maxMessagesInContext: number;
  summaryThreshold: number;
  maxTokens: number;
  storedSummaries: number;
  latestSummaryPeriodEnd: string | null;
}

export interface ClearSummariesOptions {
  /** Limit deletion to one persona; all personas otherwise */
  persona?: string;
  /** Only delete summaries created more than this many days ago; 0 deletes all */
  olderThanDays?: number;
}

/**
 * One way of producing a context. `null` means the strategy has nothing to
 * offer and the next one should be tried.
 */
interface ContextStrategy {
  name: string;
  build(request: PrepareContextRequest): Promise<WireMessage[] | null>;
}

export class ContextAssembler {
  private readonly config: ContextConfig;
  private readonly logger: Logger;
  private readonly strategies: ContextStrategy[];

  constructor(private deps: ContextAssemblerDeps) {
    this.config = resolveContextConfig(deps.config);
    this.logger = deps.logger ?? new StructuredLogger({ component: 'context-assembler' });
    this.strategies = [
      { name: 'full', build: (request) => this.buildFullContext(request) },
      { name: 'recent-messages', build: (request) => this.buildRecentContext(request) },
    ];
  }

  getConfig(): ContextConfig {
    return { ...this.config };
  }

  /**
   * Summary trigger sharing this assembler's store, token counter and
   * configured threshold and timeout
   */
  createSummaryTrigger(summarizer: Summarizer): SummaryTrigger {
    return new SummaryTrigger({
      store: this.deps.summaryStore,
      summarizer,
      threshold: this.config.summaryThreshold,
      timeoutMs: this.config.summarizerTimeoutMs,
      logger: this.logger,
      countTokens: this.deps.countTokens,
      model: this.config.model,
    });
  }

  /**
   * Assemble the context for one reply. Never throws.
   */
  async prepareContext(request: PrepareContextRequest): Promise<WireMessage[]> {
    const { userId, persona } = request;

    for (const strategy of this.strategies) {
      try {
        const context = await strategy.build(request);
        if (context) {
          this.logger.info('Context prepared', {
            userId,
            persona,
            strategy: strategy.name,
            messages: context.length,
          });
          return context;
        }
      } catch (error) {
        this.logger.error('Context strategy failed', toError(error), {
          userId,
          persona,
          strategy: strategy.name,
        });
      }
    }

    this.logger.warn('All context strategies failed, returning placeholder', { userId, persona });
    return [{ role: 'user', content: CONTEXT_UNAVAILABLE_MESSAGE }];
  }

  /**
   * Configured limits plus, for a user and persona, what the store holds
   */
  async getContextStats(userId?: string, persona?: string): Promise<ContextStats> {
    const stats: ContextStats = {
      maxMessagesInContext: this.config.maxMessagesInContext,
      summaryThreshold: this.config.summaryThreshold,
      maxTokens: this.config.maxTokens,
      storedSummaries: 0,
      latestSummaryPeriodEnd: null,
    };

    if (!userId || !persona) {
      return stats;
    }

    try {
      const summaries = await this.deps.summaryStore.getLatest(
        userId,
        persona,
        STATS_SUMMARY_SCAN_LIMIT
      );
      stats.storedSummaries = summaries.length;
      stats.latestSummaryPeriodEnd = summaries[0]?.periodEnd.toISOString() ?? null;
    } catch (error) {
      this.logger.warn('Could not read summary statistics', {
        userId,
        persona,
        error: toError(error).message,
      });
    }

    return stats;
  }

  /**
   * Delete stored summaries for a user
   *
   * @returns number of summaries deleted; 0 when the store fails
   */
  async clearSummaries(userId: string, options: ClearSummariesOptions = {}): Promise<number> {
    const olderThanDays = Math.max(0, options.olderThanDays ?? 0);
    const cutoff = new Date(Date.now() - olderThanDays * MS_PER_DAY);

    try {
      const deleted = await this.deps.summaryStore.deleteOlderThan(userId, cutoff, options.persona);
      this.logger.info('Summaries cleared', {
        userId,
        persona: options.persona ?? 'all',
        olderThanDays,
        deleted,
      });
      return deleted;
    } catch (error) {
      this.logger.error('Failed to clear summaries', toError(error), {
        userId,
        persona: options.persona ?? 'all',
      });
      return 0;
    }
  }

  private async buildFullContext(request: PrepareContextRequest): Promise<WireMessage[]> {
    const { userId, persona } = request;
    const { config, logger } = this;

    const normalized = normalizeMessages(request.rawMessages, { defaultPersona: persona, logger });

    const withSummaries = await injectSummaries(normalized, {
      store: this.deps.summaryStore,
      userId,
      persona,
      limit: config.summariesToInject,
      logger,
    });

    const withMemories = injectMemories(withSummaries, request.relevantMemories, {
      persona,
      maxMemories: config.maxInjectedMemories,
    });

    const windowed = applySlidingWindow(withMemories, config.maxMessagesInContext);

    return optimizeForTokenBudget(toWireMessages(windowed), {
      countTokens: this.deps.countTokens,
      model: config.model,
      maxTokens: config.maxTokens,
      logger,
    });
  }

  /**
   * Reduced context from the last few raw messages; no summaries, memories or
   * token budget
   */
  private async buildRecentContext(request: PrepareContextRequest): Promise<WireMessage[] | null> {
    const recent = request.rawMessages.slice(-this.config.fallbackMessageCount);
    if (recent.length === 0) {
      return null;
    }

    const normalized = normalizeMessages(recent, {
      defaultPersona: request.persona,
      logger: this.logger,
    });
    if (normalized.length === 0) {
      return null;
    }
    return toWireMessages(applySlidingWindow(normalized, this.config.maxMessagesInContext));
  }
}
