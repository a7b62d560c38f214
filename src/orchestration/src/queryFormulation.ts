/**
 * Query formulation module
 * Turns a persona and a task into ordered search intents, either through the
 * Groq chat completion API or through a deterministic heuristic.
 */

import Groq from 'groq-sdk';
import { z } from 'zod';
import { GroqConfig, QueryIntent } from './types';
import { FormulationError, toErrorMessage } from './errors';
import { logger } from './logger';

export interface FormulateOptions {
  signal?: AbortSignal;
}

export interface QueryFormulator {
  readonly name: string;
  formulate(persona: string, task: string, options?: FormulateOptions): Promise<string[]>;
}

export type CompletionFn = (prompt: string, options: FormulateOptions) => Promise<string>;

export const DEFAULT_MAX_INTENTS = 5;

/**
 * The query used whenever formulation is unavailable: "<persona>: <task>"
 */
export function buildFallbackQuery(persona: string, task: string): string {
  const role = persona.trim();
  const job = task.trim();
  if (!role) {
    return job;
  }
  if (!job) {
    return role;
  }
  return `${role}: ${job}`;
}

export function buildFallbackIntent(persona: string, task: string): QueryIntent {
  return { text: buildFallbackQuery(persona, task), rank: 0 };
}

/**
 * Trim, collapse whitespace, drop empty and case-insensitive duplicate queries,
 * keep at most `maxIntents`, and number the survivors in order.
 */
export function toQueryIntents(queries: readonly string[], maxIntents: number = DEFAULT_MAX_INTENTS): QueryIntent[] {
  const seen = new Set<string>();
  const intents: QueryIntent[] = [];

  for (const query of queries) {
    const text = query.replace(/\s+/g, ' ').trim();
    const key = text.toLowerCase();
    if (!text || seen.has(key)) {
      continue;
    }
    seen.add(key);
    intents.push({ text, rank: intents.length });
    if (intents.length >= maxIntents) {
      break;
    }
  }

  return intents;
}

const queryListSchema = z.union([
  z.array(z.string()),
  z.object({ queries: z.array(z.string()) }).transform(value => value.queries)
]);

/**
 * Parse a model response into query strings. Accepts a JSON array, a
 * `{ "queries": [...] }` object, or one query per line with optional
 * bullets or numbering.
 */
export function parseQueryList(response: string): string[] {
  let cleanedText = response.trim();
  cleanedText = cleanedText.replace(/^```(?:json)?\s*\n?/i, '');
  cleanedText = cleanedText.replace(/\n?```\s*$/i, '');

  try {
    const parsed = queryListSchema.safeParse(JSON.parse(cleanedText));
    if (parsed.success) {
      return parsed.data.map(query => query.trim()).filter(query => query.length > 0);
    }
  } catch (parseError) {
    logger.debug(`Query list is not JSON (${toErrorMessage(parseError)}); parsing lines`);
  }

  return cleanedText
    .split('\n')
    .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/^["']|["']$/g, '').trim())
    .filter(line => line.length > 0);
}

export function buildFormulationPrompt(persona: string, task: string, maxQueries: number): string {
  return `You are helping a ${persona} find the most useful passages in a collection of documents.

Task: ${task}

Write between 1 and ${maxQueries} short search queries, each covering a different facet of the task,
ordered from most to least important.

Return ONLY a JSON array of strings with no markdown formatting, no code blocks, no additional text.`;
}

/**
 * Always returns the single fallback query. Used when no LLM is configured.
 */
export class HeuristicQueryFormulator implements QueryFormulator {
  readonly name = 'heuristic';

  async formulate(persona: string, task: string): Promise<string[]> {
    return [buildFallbackQuery(persona, task)];
  }
}

export class GroqQueryFormulator implements QueryFormulator {
  readonly name = 'groq';

  constructor(
    private readonly complete: CompletionFn,
    private readonly maxQueries: number = DEFAULT_MAX_INTENTS
  ) {}

  static fromConfig(config: GroqConfig, maxQueries: number = DEFAULT_MAX_INTENTS): GroqQueryFormulator {
    const groqClient = new Groq({ apiKey: config.apiKey });

    // The caller's timeout aborts the request; retries would outlive it
    const complete: CompletionFn = async (prompt, options) => {
      const response = await groqClient.chat.completions.create(
        {
          model: config.model,
          messages: [
            { role: 'system', content: 'You are a JSON generator. Always return valid JSON only, no other text.' },
            { role: 'user', content: prompt }
          ],
          temperature: config.temperature,
          max_tokens: config.maxTokens ?? 300
        },
        { signal: options.signal, maxRetries: 0 }
      );
      return response.choices[0]?.message?.content ?? '';
    };

    return new GroqQueryFormulator(complete, maxQueries);
  }

  async formulate(persona: string, task: string, options: FormulateOptions = {}): Promise<string[]> {
    let response: string;
    try {
      response = await this.complete(buildFormulationPrompt(persona, task, this.maxQueries), options);
    } catch (error) {
      throw new FormulationError(`Query formulation service failed: ${toErrorMessage(error)}`, { cause: error });
    }

    logger.debug(`Raw formulation response: ${response.slice(0, 200)}`);

    const queries = parseQueryList(response);
    if (queries.length === 0) {
      throw new FormulationError('Query formulation returned no usable queries');
    }
    return queries.slice(0, this.maxQueries);
  }
}
