import { request } from 'undici';
import { z } from 'zod';
import { APP_TITLE, OPENROUTER_REFERER } from '../../config/constants';
import {
  ApiError,
  ConfigurationError,
  ResponseFormatError,
  TimeoutError,
  TransportError,
  describeError,
  isTransientFailure,
} from '../errors';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import type {
  ChatCompletion,
  ChatCompletionOptions,
  ChatCompletionProvider,
  ChatCompletionRequest,
} from './types';

export interface ChatCompletionClientConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1, 'response contained no choices'),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .passthrough()
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Client for OpenAI-compatible chat completions (OpenRouter by default).
 * One call, one HTTP request: retry policy belongs to callers.
 */
export class ChatCompletionClient implements ChatCompletionProvider {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(config: ChatCompletionClientConfig) {
    if (!config.baseUrl) {
      throw new ConfigurationError('baseUrl is required for the chat completion client');
    }
    if (!config.apiKey) {
      throw new ConfigurationError('apiKey is required for the chat completion client');
    }

    this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 120000;
  }

  async complete(
    body: ChatCompletionRequest,
    options: ChatCompletionOptions = {}
  ): Promise<ChatCompletion> {
    const log = createChildLogger(generateCorrelationId());
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return withTiming(log, 'llm.chat_completion', () => this.send(body, timeoutMs), {
      model: body.model,
      messageCount: body.messages.length,
    });
  }

  private async send(body: ChatCompletionRequest, timeoutMs: number): Promise<ChatCompletion> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let statusCode: number;
    let responseText: string;
    try {
      const response = await request(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'HTTP-Referer': OPENROUTER_REFERER,
          'X-Title': APP_TITLE,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      statusCode = response.statusCode;
      responseText = await response.body.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError('Chat completion request timed out', timeoutMs);
      }
      throw new TransportError(describeError(error), isTransientFailure(error), error);
    } finally {
      clearTimeout(timeout);
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new ApiError(extractErrorMessage(responseText, statusCode), statusCode);
    }

    return parseChatCompletion(responseText, body.model);
  }
}

function extractErrorMessage(responseText: string, statusCode: number): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(responseText));
    if (parsed.success) {
      return parsed.data.error.message;
    }
  } catch {
    // Body is not JSON; fall through to the status line
  }
  return `HTTP ${statusCode}`;
}

export function parseChatCompletion(responseText: string, requestedModel: string): ChatCompletion {
  let json: unknown;
  try {
    json = JSON.parse(responseText);
  } catch {
    throw new ResponseFormatError('body is not valid JSON');
  }

  const parsed = ChatCompletionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ResponseFormatError(`${where}${issue?.message ?? 'invalid shape'}`);
  }

  return {
    content: parsed.data.choices[0].message.content,
    model: parsed.data.model ?? requestedModel,
    usage: parsed.data.usage,
  };
}
