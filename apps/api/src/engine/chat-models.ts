import OpenAI from 'openai';
import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';

export type ChatProvider = 'gemini' | 'openai';

export interface ChatRequest {
  system: string;
  prompt: string;
}

/**
 * A single-turn text completion. Implementations throw on any failure,
 * including a timeout; callers decide what a failure means.
 */
export interface ChatModel {
  readonly provider: ChatProvider;
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

export interface ChatModelConfig {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAIChatModel implements ChatModel {
  readonly provider = 'openai' as const;
  readonly model: string;
  private client: OpenAI;

  constructor(config: ChatModelConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? 15000,
      maxRetries: 0,
    });
  }

  async complete({ system, prompt }: ChatRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
      temperature: 0.3,
    });

    return (response.choices[0]?.message?.content ?? '').trim();
  }
}

export class GeminiChatModel implements ChatModel {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private generative: GenerativeModel;

  constructor(config: ChatModelConfig) {
    this.model = config.model;
    this.generative = new GoogleGenerativeAI(config.apiKey).getGenerativeModel(
      { model: config.model },
      { timeout: config.timeoutMs ?? 15000 }
    );
  }

  async complete({ system, prompt }: ChatRequest): Promise<string> {
    const result = await this.generative.generateContent({
      systemInstruction: system,
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { temperature: 0.3 },
    });

    return result.response.text().trim();
  }
}
