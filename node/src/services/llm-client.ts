// node/src/services/llm-client.ts — low-level client implementing LlmClient for the router

import OpenAI from 'openai';
import type { LlmClient, ModelName, LlmCallOptions, ChatPrompt } from './model-router';

export interface ProviderLlmClientConfig {
  apiKey?: string;
  baseURL: string;
  parseModel: string;
  nlgModel: string;
}

/** OpenAI-compatible chat completions (OpenAI itself or a self-hosted endpoint such as vLLM). */
export class ProviderLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(private readonly config: ProviderLlmClientConfig) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey, baseURL: this.config.baseURL });
    }
    return this.client;
  }

  async call(model: ModelName, prompt: ChatPrompt, options: LlmCallOptions): Promise<string> {
    const modelId = model === 'parse' ? this.config.parseModel : this.config.nlgModel;
    const isExtraction = options.task === 'extraction';

    const res = await this.getClient().chat.completions.create(
      {
        model: modelId,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: isExtraction ? 0 : 0.2,
        max_tokens: options.maxTokens ?? 512,
        ...(isExtraction ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: options.signal },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
