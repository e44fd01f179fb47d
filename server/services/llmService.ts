import JSON5 from 'json5';
import type { AppConfig } from '../../shared/config';
import { GenerationError } from '../../shared/errors';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../obs/logger';
import { sleep as defaultSleep, type Sleep } from '../utils/async';
import { extractJson } from '../utils/jsonExtract';
import { errorStatus, extractGenerateContentText, isTransientError, rateLimitedGenerateContent } from './genai';

export interface GenerateOptions {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
  signal?: AbortSignal;
}

/** Prompt in, parsed JSON out. The pipeline depends on this seam only. */
export interface GenerationCapability {
  generateJson(prompt: string, options?: GenerateOptions): Promise<unknown>;
}

/** Unwraps fences, recovers the JSON body and parses it leniently. */
export const parseModelJson = (raw: string): unknown => {
  const extracted = extractJson(raw);
  if (!extracted) {
    throw new GenerationError('No JSON found in model response', { preview: raw.slice(0, 200) });
  }
  try {
    const parsed: unknown = JSON5.parse(extracted);
    return parsed;
  } catch (error) {
    throw new GenerationError(`Malformed JSON in model response: ${errorMessage(error)}`, {
      preview: extracted.slice(0, 200),
    });
  }
};

export class LLMService implements GenerationCapability {
  constructor(
    private config: Pick<AppConfig, 'llm'>,
    private logger: Logger,
    private sleep: Sleep = defaultSleep,
  ) {}

  async generateWithRetry(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const primaryModel = options.model || this.config.llm.model;
    const fallbackModel = this.config.llm.fallbackModel;

    let currentModel = primaryModel;
    const maxAttempts = 3;
    const modelsTried: string[] = [];
    let lastErrorMessage: string | null = null;
    let lastErrorCode: number | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      modelsTried.push(currentModel);
      try {
        const response = await rateLimitedGenerateContent(this.config, {
          model: currentModel,
          prompt,
          config: {
            temperature: options.temperature ?? this.config.llm.temperature,
            maxOutputTokens: options.maxOutputTokens ?? this.config.llm.maxOutputTokens,
            responseMimeType: options.responseMimeType,
          },
          signal: options.signal,
        });

        const text = extractGenerateContentText(response);
        if (text) return text;

        throw new Error('Empty response from LLM');
      } catch (error) {
        if (options.signal?.aborted) throw error;

        const isTransient = isTransientError(error);
        lastErrorMessage = errorMessage(error);
        lastErrorCode = errorStatus(error);
        this.logger.warn('LLM generation error', {
          model: currentModel,
          attempt,
          error: lastErrorMessage,
          errorCode: lastErrorCode,
          isTransient,
        });

        if (!isTransient && errorStatus(error) != null && errorStatus(error) !== 500) throw error;
        if (attempt >= maxAttempts) break;

        if (currentModel === primaryModel && fallbackModel && fallbackModel !== primaryModel) {
          currentModel = fallbackModel;
          this.logger.info('Falling back to secondary model', { model: currentModel });
          continue;
        }

        await this.sleep(2 ** attempt * 1000);
      }
    }

    const modelsSummary = Array.from(new Set(modelsTried)).join(' -> ');
    const codePart = lastErrorCode != null ? ` (code ${lastErrorCode})` : '';
    const lastPart = lastErrorMessage ? ` Last error: ${lastErrorMessage}${codePart}.` : '';
    throw new Error(`Failed to generate content after ${maxAttempts} attempts (models: ${modelsSummary}).${lastPart}`);
  }

  async generateJson(prompt: string, options: GenerateOptions = {}): Promise<unknown> {
    const raw = await this.generateWithRetry(prompt, {
      ...options,
      responseMimeType: 'application/json',
    });
    return parseModelJson(raw);
  }
}
