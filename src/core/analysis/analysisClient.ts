import { describeError } from '../errors';
import { toImageContentPart, type PreparedImage } from '../images/imagePreparer';
import type { ChatCompletionProvider, ContentPart, TokenUsage } from '../llm/types';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { buildAnalysisPrompt } from './prompts';

export interface AnalysisRequest {
  text: string;
  images?: readonly PreparedImage[];
  linksSummary?: string;
  enrichmentText?: string;
}

export interface AnalysisSuccess {
  success: true;
  analysisText: string;
  modelUsed: string;
  tokenUsage?: TokenUsage;
}

export interface AnalysisFailure {
  success: false;
  error: string;
  modelUsed?: string;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export interface AnalysisService {
  analyze(request: AnalysisRequest): Promise<AnalysisResult>;
}

export interface AnalysisClientOptions {
  provider: ChatCompletionProvider;
  textModel: string;
  visionModel: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Sends the deck to the model in one request. Never throws: every failure
 * comes back as `{ success: false }` for the report to explain.
 */
export class AnalysisClient implements AnalysisService {
  constructor(private readonly options: AnalysisClientOptions) {}

  selectModel(hasImages: boolean): string {
    return hasImages ? this.options.visionModel : this.options.textModel;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const log = createChildLogger(generateCorrelationId());
    const images = request.images ?? [];
    const hasImages = images.length > 0;
    const model = this.selectModel(hasImages);

    const prompt = buildAnalysisPrompt({
      text: request.text,
      linksSummary: request.linksSummary,
      enrichmentText: request.enrichmentText,
      hasImages,
    });

    const content: string | ContentPart[] = hasImages
      ? [{ type: 'text', text: prompt }, ...images.map(toImageContentPart)]
      : prompt;

    try {
      const completion = await this.options.provider.complete({
        model,
        messages: [{ role: 'user', content }],
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
      });

      log.info(
        { model: completion.model, imageCount: images.length, usage: completion.usage },
        'Analysis completed'
      );

      return {
        success: true,
        analysisText: completion.content,
        modelUsed: completion.model,
        tokenUsage: completion.usage,
      };
    } catch (error) {
      const message = describeError(error);
      log.error({ model, error: message }, 'Analysis request failed');
      return { success: false, error: message, modelUsed: model };
    }
  }
}
