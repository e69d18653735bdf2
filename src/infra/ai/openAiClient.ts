import { z } from "zod";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
  maxTokens?: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

const DEFAULT_MAX_TOKENS = 100;

export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch("https://api.openai.com/v1/embeddings", {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector.");
    }
    return embedding;
  }

  async generate(prompt: string, variantCount: number, signal?: AbortSignal): Promise<string[]> {
    const apiKey = this.requireApiKey();

    const response = await fetch("https://api.openai.com/v1/chat/completions", {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: 0.7,
        top_p: 0.9,
        n: variantCount,
        max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages: [
          {
            role: "system",
            content:
              "You are a writing assistant. Keep the user's voice and write only the text the prompt asks for.",
          },
          {
            role: "user",
            content: prompt,
          },
        ],
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.choices
      .map((choice) => choice.message.content?.trim() ?? "")
      .filter((text) => text.length > 0);
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
