/**
 * Mock Inference Provider
 *
 * Answers prompts from canned response templates. Responses are cached by a
 * key built from the first 50 prompt characters and the generation options,
 * so identical requests always get identical text.
 */

import { GenerateOptions, InferenceProvider } from '../types.js';
import { createLogger } from '../../common/logger.js';
import defaultTemplates from './templates.json';

const logger = createLogger('MockInferenceProvider');

export interface ResponseTemplates {
  architecture: string;
  code: string;
  critique: string;
}

export class MockInferenceProvider implements InferenceProvider {
  private cache: Map<string, string> = new Map();
  private templates: ResponseTemplates;
  private requestCount = 0;

  constructor(templates: Partial<ResponseTemplates> = {}) {
    this.templates = { ...defaultTemplates, ...templates };
  }

  public async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.requestCount++;
    const cacheKey = `${prompt.slice(0, 50)}_${options.maxTokens}_${options.temperature}`;

    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      logger.debug('Returning cached response', { cacheKey });
      return cached;
    }

    const response = this.respond(prompt);
    this.cache.set(cacheKey, response);
    return response;
  }

  public getStats(): { cacheSize: number; requestCount: number } {
    return { cacheSize: this.cache.size, requestCount: this.requestCount };
  }

  private respond(prompt: string): string {
    const normalized = prompt.toLowerCase();

    if (normalized.includes('design a system')) {
      return this.templates.architecture;
    }
    if (normalized.includes('generate code')) {
      return this.templates.code;
    }
    if (normalized.includes('evaluate') || normalized.includes('critique')) {
      return this.templates.critique;
    }
    return `Generated response for: ${prompt.slice(0, 100)}...`;
  }
}
