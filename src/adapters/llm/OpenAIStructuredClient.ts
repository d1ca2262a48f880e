// Structured-output calls against the OpenAI Responses API.
// One request per generation; a second one only when the first was cut off by the token budget.

import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import type { Response as OpenAIResponse } from 'openai/resources/responses/responses';
import { Logger } from '../../core/services/Logger';
import { BackendError, RecommendationError, ResponseValidationError } from '../../core/errors';

// Narrowest slice of the SDK we touch, so tests can hand in a stub client.
export type ResponsesClient = { responses: Pick<OpenAI['responses'], 'create'> };

export interface StructuredTask<T> {
  name: string; // schema name reported to the API
  system: string;
  user: string;
  schema: Record<string, unknown>;
  parse(raw: unknown): T;
}

export interface StructuredClientOptions {
  temperature?: number;
  timeoutMs?: number;
  maxOutputTokens?: number;
}

const MAX_ATTEMPTS = 2;
const MAX_OUTPUT_TOKENS_CAP = 16384;
const DEFAULT_TIMEOUT_MS = 60000;

// Reasoning models reject the temperature parameter.
export function supportsTemperature(model: string): boolean {
  return !/^(o\d|gpt-5)/i.test(model);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// Direct parse, then a ```json fence, then the outermost braces.
export function extractJson(text: string): unknown {
  const direct = parseJson(text);
  if (direct !== undefined) return direct;

  const fenceMatch = text.match(/```(?:json)?\s*\n([\s\S]*?)\n\s*```/i);
  if (fenceMatch && fenceMatch[1]) {
    const fenced = parseJson(fenceMatch[1].trim());
    if (fenced !== undefined) return fenced;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return parseJson(text.slice(start, end + 1));
  }
  return undefined;
}

export class OpenAIStructuredClient {
  constructor(
    private client: ResponsesClient,
    private model: string,
    private logger: Logger,
    private options: StructuredClientOptions = {}
  ) {}

  private get timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private toBackendError(error: unknown): BackendError {
    if (error instanceof APIConnectionTimeoutError) {
      return new BackendError(`OpenAI request timed out after ${this.timeoutMs}ms`, { cause: error });
    }
    if (error instanceof APIError && error.status !== undefined) {
      return new BackendError(`OpenAI request failed (HTTP ${error.status}): ${error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new BackendError(`OpenAI request failed: ${message}`, { cause: error });
  }

  private async send<T>(task: StructuredTask<T>, maxTokens: number): Promise<OpenAIResponse> {
    const { temperature } = this.options;
    try {
      return await this.client.responses.create(
        {
          model: this.model,
          input: [
            { role: 'system', content: task.system },
            { role: 'user', content: task.user },
          ],
          text: {
            format: {
              type: 'json_schema',
              name: task.name,
              schema: task.schema,
              strict: true,
            },
          },
          ...(temperature != null && supportsTemperature(this.model) ? { temperature } : {}),
          max_output_tokens: maxTokens,
        },
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      throw this.toBackendError(error);
    }
  }

  private extractContent(res: OpenAIResponse): { text?: string; refusal?: string } {
    for (const item of res.output ?? []) {
      if (item.type !== 'message') continue;
      for (const part of item.content) {
        if (part.type === 'refusal') return { refusal: part.refusal };
        if (part.type === 'output_text' && part.text) return { text: part.text };
      }
    }
    if (typeof res.output_text === 'string' && res.output_text) {
      return { text: res.output_text };
    }
    return {};
  }

  async generate<T>(task: StructuredTask<T>): Promise<T> {
    let maxTokens = this.options.maxOutputTokens ?? 4096;
    try {
      for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
        this.logger.info(`Requesting ${task.name} from ${this.model} (attempt ${attempt}/${MAX_ATTEMPTS})`);
        this.logger.debug(`Max output tokens: ${maxTokens}. Prompt preview: ${task.user.substring(0, 200)}`);

        const startTime = Date.now();
        const res = await this.send(task, maxTokens);
        this.logger.info(`OpenAI response received in ${Date.now() - startTime}ms`);
        this.logger.debug(`Response status: ${res.status}`, res.usage ?? {});

        const { text, refusal } = this.extractContent(res);
        if (refusal !== undefined) {
          throw new ResponseValidationError(`Model refused to respond: ${refusal}`);
        }

        const parsed = text === undefined ? undefined : extractJson(text);
        const truncated = res.status === 'incomplete' && res.incomplete_details?.reason === 'max_output_tokens';
        if (parsed === undefined && truncated) {
          if (attempt < MAX_ATTEMPTS && maxTokens < MAX_OUTPUT_TOKENS_CAP) {
            maxTokens = Math.min(MAX_OUTPUT_TOKENS_CAP, maxTokens * 2);
            this.logger.warn(`Response truncated; retrying with max output tokens ${maxTokens}`);
            continue;
          }
          throw new ResponseValidationError('Response incomplete due to max output tokens limit');
        }
        if (parsed === undefined) {
          throw new ResponseValidationError('Response did not contain a JSON object');
        }

        return task.parse(parsed);
      }
      throw new ResponseValidationError('Response incomplete due to max output tokens limit');
    } catch (error) {
      this.logger.error(`Error generating ${task.name}:`, error);
      if (error instanceof RecommendationError) throw error;
      // send() already maps transport failures, so anything else came from reading the reply
      const message = error instanceof Error ? error.message : String(error);
      throw new ResponseValidationError(`Could not read ${task.name} response: ${message}`);
    }
  }
}
