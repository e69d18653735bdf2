import { z } from "zod";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  maxTokens?: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const generateResponseSchema = z.object({
  response: z.string().optional(),
});

const EMBEDDING_CONCURRENCY = 4;
const DEFAULT_MAX_TOKENS = 100;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  /** One completion per variant, each sampled at a higher temperature. */
  async generate(prompt: string, variantCount: number, signal?: AbortSignal): Promise<string[]> {
    const outputs: string[] = [];
    for (let variant = 0; variant < variantCount; variant += 1) {
      const response = await fetch(`${this.options.baseUrl}/api/generate`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          prompt,
          stream: false,
          keep_alive: "30m",
          options: {
            temperature: variantTemperature(variant),
            num_predict: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
            top_p: 0.9,
            top_k: 40,
            stop: ["</s>", "\n\n\n"],
          },
        }),
        signal,
      });

      if (!response.ok) {
        throw new Error(
          `Ollama generate failed (${response.status}): ${await response.text()}`,
        );
      }

      const data = generateResponseSchema.parse(await response.json());
      const text = data.response?.trim();
      if (text) {
        outputs.push(text);
      }
    }
    return outputs;
  }
}

function variantTemperature(variant: number): number {
  return Number(Math.min(1.2, 0.5 + variant * 0.2).toFixed(2));
}
