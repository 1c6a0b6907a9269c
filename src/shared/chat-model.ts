/**
 * Chat-completion access for the LLM-backed collaborators (tier oracle,
 * report rewrite). Any OpenAI-compatible endpoint works; Groq by default.
 */

import OpenAI from 'openai';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatModel {
  readonly modelName: string;
  complete(messages: ChatMessage[], options?: { temperature?: number; maxTokens?: number }): Promise<string>;
}

export interface OpenAIChatModelConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export class OpenAIChatModel implements ChatModel {
  readonly modelName: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(config: OpenAIChatModelConfig) {
    this.modelName = config.model;
    this.temperature = config.temperature;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 1,
    });
  }

  async complete(messages: ChatMessage[], options: { temperature?: number; maxTokens?: number } = {}): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.modelName,
      messages,
      temperature: options.temperature ?? this.temperature,
      max_tokens: options.maxTokens,
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error(`Empty completion from ${this.modelName}`);
    }
    return content.trim();
  }
}
