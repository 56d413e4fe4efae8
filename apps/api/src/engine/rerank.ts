/**
 * LLM Reranker
 *
 * Asks a chat model to order a vector-search candidate list by relevance to
 * the query. The model answers with candidate numbers; anything it leaves
 * out is appended in vector order, so the result is always a full
 * permutation of the input. When every model fails the input order is kept.
 */

import { logger } from '../config/index.js';
import type { CatalogItem } from '../catalog/catalog.js';
import { describeError } from '../embeddings/failures.js';
import { GeminiChatModel, OpenAIChatModel, type ChatModel, type ChatProvider } from './chat-models.js';

const SYSTEM_PROMPT = 'You are an expert in HR and talent assessment.';

export interface RerankOutcome {
  items: CatalogItem[];
  /** True when no model produced a ranking and the input order was kept */
  degraded: boolean;
  provider?: ChatProvider;
  reason?: string;
}

/**
 * Parse a model reply into 0-based candidate indices.
 *
 * Every integer in the text is read as a 1-based candidate number; numbers
 * out of range and repeats are dropped, and unmentioned candidates follow in
 * their original order. The result is always a permutation of 0..count-1.
 */
export function parseRankedOrder(text: string, count: number): number[] {
  const seen = new Set<number>();
  const order: number[] = [];

  for (const token of text.match(/\d+/g) ?? []) {
    const index = Number.parseInt(token, 10) - 1;
    if (index >= 0 && index < count && !seen.has(index)) {
      seen.add(index);
      order.push(index);
    }
  }

  for (let i = 0; i < count; i++) {
    if (!seen.has(i)) order.push(i);
  }

  return order;
}

export function buildRerankPrompt(query: string, candidates: readonly CatalogItem[]): string {
  const listing = candidates
    .map((item, i) => `${i + 1}. ${item.name} (${item.type || 'Unknown'}): ${item.description || 'No description'}`)
    .join('\n');

  return `Given a job description or query, rank the following assessments by relevance and importance for that role.

Job Description/Query:
${query}

Available Assessments:
${listing}

Rank these assessments from most relevant (1) to least relevant (${candidates.length}).
Return only the numbers in order of relevance, separated by commas. For example: 3,1,5,2,4

Ranked order:`;
}

export class LLMReranker {
  private models: ChatModel[];

  /**
   * @param models tried in order; the first one that answers wins
   */
  constructor(models: ChatModel[]) {
    this.models = models;
  }

  getProviders(): ChatProvider[] {
    return this.models.map((model) => model.provider);
  }

  async rerank(query: string, candidates: readonly CatalogItem[], topK: number): Promise<CatalogItem[]> {
    const outcome = await this.rankWithDiagnostics(query, candidates, topK);
    return outcome.items;
  }

  async rankWithDiagnostics(
    query: string,
    candidates: readonly CatalogItem[],
    topK: number
  ): Promise<RerankOutcome> {
    const limit = Math.max(0, Math.floor(topK));

    if (candidates.length < 2) {
      return { items: candidates.slice(0, limit), degraded: false };
    }

    if (!this.models.length) {
      return { items: candidates.slice(0, limit), degraded: true, reason: 'no reranking model configured' };
    }

    const prompt = buildRerankPrompt(query, candidates);
    const failures: string[] = [];

    for (const model of this.models) {
      const startTime = Date.now();
      try {
        const reply = await model.complete({ system: SYSTEM_PROMPT, prompt });
        const order = parseRankedOrder(reply, candidates.length);

        logger.debug({
          provider: model.provider,
          model: model.model,
          candidates: candidates.length,
          duration: Date.now() - startTime,
        }, 'Candidates reranked');

        return {
          items: order.slice(0, limit).map((index) => candidates[index]),
          degraded: false,
          provider: model.provider,
        };
      } catch (error) {
        failures.push(`${model.provider}: ${describeError(error)}`);
        logger.warn({
          provider: model.provider,
          model: model.model,
          error: describeError(error),
          duration: Date.now() - startTime,
        }, 'Reranking model failed');
      }
    }

    const reason = failures.join('; ');
    logger.warn({ reason, candidates: candidates.length }, 'Reranking degraded, keeping vector order');
    return { items: candidates.slice(0, limit), degraded: true, reason };
  }
}

export interface RerankerConfig {
  enabled: boolean;
  timeoutMs?: number;
  gemini?: { apiKey: string; model: string };
  openai?: { apiKey: string; model: string };
}

/**
 * Gemini first, OpenAI second. Returns null when reranking is switched off
 * or no model credential is configured.
 */
export function createReranker(config: RerankerConfig): LLMReranker | null {
  if (!config.enabled) {
    return null;
  }

  const models: ChatModel[] = [];
  if (config.gemini) {
    models.push(new GeminiChatModel({ ...config.gemini, timeoutMs: config.timeoutMs }));
  }
  if (config.openai) {
    models.push(new OpenAIChatModel({ ...config.openai, timeoutMs: config.timeoutMs }));
  }

  if (!models.length) {
    logger.info('No API keys found for reranking, reranking disabled');
    return null;
  }

  return new LLMReranker(models);
}
