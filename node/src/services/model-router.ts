// node/src/services/model-router.ts — central routing per task type

export type ModelName = 'parse' | 'nlg';

export interface ChatPrompt {
  system: string;
  user: string;
}

export interface LlmCallOptions {
  task: 'extraction' | 'summary';
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  call(model: ModelName, prompt: ChatPrompt, options: LlmCallOptions): Promise<string>;
}

export class SimpleModelRouter {
  constructor(private readonly client: LlmClient) {}

  /** Structured extraction; the client is asked for a JSON object. */
  async extract(prompt: ChatPrompt, signal?: AbortSignal): Promise<string> {
    return this.client.call('parse', prompt, {
      task: 'extraction',
      maxTokens: 256,
      signal,
    });
  }

  async summarize(prompt: ChatPrompt, signal?: AbortSignal): Promise<string> {
    return this.client.call('nlg', prompt, {
      task: 'summary',
      maxTokens: 512,
      signal,
    });
  }
}
