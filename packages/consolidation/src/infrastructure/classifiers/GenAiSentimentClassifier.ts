import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters } from '@google/genai';
import type { SentimentClassifier } from '@customer360/core';
import { ConfigurationError } from '@customer360/core';

/** The part of the GenAI client the classifier calls. `GoogleGenAI` satisfies it. */
export interface GenerateContentClient {
  readonly models: {
    generateContent(params: GenerateContentParameters): Promise<{ readonly text?: string | undefined }>;
  };
}

export interface GenAiSentimentClassifierOptions {
  /** API key used to build a `GoogleGenAI` client when `client` is not given. */
  readonly apiKey?: string;
  /** Pre-built client, shared across classifiers. */
  readonly client?: GenerateContentClient;
  /** Default: `'gemini-2.0-flash'`. */
  readonly model?: string;
  /** Default: `0.3`. */
  readonly temperature?: number;
  /** Default: `1024`. */
  readonly maxOutputTokens?: number;
}

/** `SentimentClassifier` backed by a Gemini model through `@google/genai`. */
export class GenAiSentimentClassifier implements SentimentClassifier {
  private readonly client: GenerateContentClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;

  constructor(options: GenAiSentimentClassifierOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new GoogleGenAI({ apiKey: options.apiKey });
    } else {
      throw new ConfigurationError('GenAiSentimentClassifier needs either a client or an apiKey');
    }
    this.model = options.model ?? 'gemini-2.0-flash';
    this.temperature = options.temperature ?? 0.3;
    this.maxOutputTokens = options.maxOutputTokens ?? 1024;
  }

  async classify(prompt: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: prompt,
      config: { temperature: this.temperature, maxOutputTokens: this.maxOutputTokens },
    });
    return response.text ?? '';
  }
}
