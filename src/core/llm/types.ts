export interface TextContentPart {
  type: 'text';
  text: string;
}

export interface ImageContentPart {
  type: 'image_url';
  image_url: {
    url: string;
    detail: 'low' | 'high' | 'auto';
  };
}

export type ContentPart = TextContentPart | ImageContentPart;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ContentPart[];
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface TokenUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface ChatCompletion {
  content: string;
  model: string;
  usage?: TokenUsage;
}

export interface ChatCompletionOptions {
  timeoutMs?: number;
}

/**
 * Anything that can answer one chat-completions request.
 */
export interface ChatCompletionProvider {
  complete(request: ChatCompletionRequest, options?: ChatCompletionOptions): Promise<ChatCompletion>;
}
