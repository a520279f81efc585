import OpenAI from 'openai';
import { z } from 'zod';
import { CircuitBreaker } from '../scraping/retry.js';
import { ModelResponseError, errorMessage } from '../errors.js';
import type { SearchSettings } from '../config.js';

export interface CompletionRequest {
  system: string;
  user: string;
}

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Returns model output already validated against the caller's schema. */
export interface StructuredCompleter {
  complete<T>(request: CompletionRequest, schema: OutputSchema<T>, signal?: AbortSignal): Promise<T>;
}

export interface OpenAICompleterOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  client?: OpenAI;
}

export class OpenAICompleter implements StructuredCompleter {
  private client: OpenAI;
  private circuitBreaker: CircuitBreaker;

  constructor(private options: OpenAICompleterOptions) {
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 1
    });
    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: 5,
      resetTimeout: 60000
    });
  }

  async complete<T>(request: CompletionRequest, schema: OutputSchema<T>, signal?: AbortSignal): Promise<T> {
    const raw = await this.circuitBreaker.execute(async () => {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        temperature: this.options.temperature,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user }
        ]
      }, { signal });

      return completion.choices[0]?.message?.content ?? '';
    });

    return parseStructured(raw, schema);
  }
}

/** Stand-in used when no model credentials are configured; every call fails. */
export class UnavailableCompleter implements StructuredCompleter {
  async complete<T>(_request: CompletionRequest, _schema: OutputSchema<T>): Promise<T> {
    throw new ModelResponseError('No language model is configured (set OPENAI_API_KEY)');
  }
}

export function createCompleter(model: SearchSettings['model']): StructuredCompleter {
  if (!model.apiKey) {
    console.warn('[Completer] OPENAI_API_KEY is not set; AI extraction and scoring are disabled');
    return new UnavailableCompleter();
  }
  return new OpenAICompleter({
    apiKey: model.apiKey,
    baseUrl: model.baseUrl,
    model: model.name,
    temperature: model.temperature,
    timeoutMs: model.timeoutMs
  });
}

/**
 * Pull a JSON value out of a model reply. Accepts bare JSON, fenced code
 * blocks, or prose wrapped around a single object or array.
 */
export function parseModelJson(raw: string): unknown {
  const trimmed = raw.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const body = fenced ? fenced[1].trim() : trimmed;

  try {
    const value: unknown = JSON.parse(body);
    return value;
  } catch (error) {
    const match = /[[{][\s\S]*[\]}]/.exec(body);
    if (!match) {
      throw error;
    }
    const value: unknown = JSON.parse(match[0]);
    return value;
  }
}

export function parseStructured<T>(raw: string, schema: OutputSchema<T>): T {
  let value: unknown;
  try {
    value = parseModelJson(raw);
  } catch (error) {
    throw new ModelResponseError(`Model returned unparseable JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ModelResponseError(`Model output failed validation: ${issues.join('; ')}`);
  }
  return parsed.data;
}
