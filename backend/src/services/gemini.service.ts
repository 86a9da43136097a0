/**
 * Gemini AI Service
 * Text generation through Google's Gemini API, behind the `Inferencer` interface
 */

import {
  GoogleGenerativeAI,
  FinishReason,
  type GenerationConfig,
  type ModelParams,
  type RequestOptions,
} from '@google/generative-ai';
import type { Logger } from 'pino';
import type { Inferencer } from '../types/generation.js';
import { InferenceError, errorMessage, statusOf } from '../utils/errors.js';

export interface GeminiOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

// The slice of the SDK response this service reads
export interface GeminiResponse {
  text(): string;
  candidates?: { finishReason?: FinishReason }[];
}

export interface TextModel {
  generateContent(prompt: string): Promise<{ response: GeminiResponse }>;
}

export type ModelFactory = (params: ModelParams, requestOptions: RequestOptions) => TextModel;

const sdkModelFactory = (apiKey: string): ModelFactory => {
  const genAI = new GoogleGenerativeAI(apiKey);
  return (params, requestOptions) => genAI.getGenerativeModel(params, requestOptions);
};

export class GeminiService implements Inferencer {
  private readonly options: GeminiOptions;
  private readonly model: TextModel;
  private readonly logger: Logger | null;

  constructor(options: GeminiOptions, logger?: Logger, modelFactory?: ModelFactory) {
    this.options = options;
    this.logger = logger ?? null;

    const generationConfig: GenerationConfig = {
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
      topP: 0.95,
      topK: 40,
    };

    const factory = modelFactory ?? sdkModelFactory(options.apiKey);
    this.model = factory({ model: options.model, generationConfig }, { timeout: options.timeoutMs });
  }

  isConfigured(): boolean {
    return this.options.apiKey.trim().length > 0;
  }

  /**
   * Single attempt, no retries: a failed call fails its pair and the caller
   * decides whether to resubmit.
   */
  async generateText(prompt: string): Promise<string> {
    let response: GeminiResponse;
    try {
      ({ response } = await this.model.generateContent(prompt));
    } catch (error) {
      const status = statusOf(error);
      const retryable = status === 429 || (status !== undefined && status >= 500);
      this.logger?.warn({ status, model: this.options.model }, `⚠ Gemini request failed: ${errorMessage(error)}`);
      throw new InferenceError(`Gemini AI error: ${errorMessage(error)}`, retryable);
    }

    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && finishReason !== FinishReason.STOP && finishReason !== FinishReason.MAX_TOKENS) {
      throw new InferenceError(`AI response was incomplete or blocked (Reason: ${finishReason})`);
    }

    let text: string;
    try {
      text = response.text();
    } catch (error) {
      throw new InferenceError(`Could not extract text from Gemini response: ${errorMessage(error)}`);
    }

    if (text.trim().length === 0) {
      throw new InferenceError('Empty response from Gemini AI');
    }

    if (finishReason === FinishReason.MAX_TOKENS) {
      this.logger?.warn({ model: this.options.model, length: text.length }, '⚠ Gemini response may be truncated (MAX_TOKENS)');
    }

    return text;
  }
}
