import { AppConfig } from "../../config/env.js";
import { describeError, EmbeddingUnavailableError } from "../../domain/errors.js";
import { HashingEmbeddingClient } from "./hashingEmbeddingClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient, EmbeddingProvider, GenerationProvider } from "./types.js";

export type AiClientConfig = Pick<
  AppConfig,
  | "embeddingProvider"
  | "generationProvider"
  | "openaiApiKey"
  | "openaiEmbeddingModel"
  | "openaiChatModel"
  | "ollamaBaseUrl"
  | "ollamaChatModel"
  | "ollamaEmbeddingModel"
  | "generationMaxTokens"
  | "vectorDimension"
>;

export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly hashing: HashingEmbeddingClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly generationProvider: GenerationProvider;

  constructor(config: AiClientConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
      maxTokens: config.generationMaxTokens,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      maxTokens: config.generationMaxTokens,
    });
    this.hashing = new HashingEmbeddingClient(config.vectorDimension);
    this.embeddingProvider = config.embeddingProvider;
    this.generationProvider = config.generationProvider;
  }

  getEmbeddingProvider(): EmbeddingProvider {
    return this.embeddingProvider;
  }

  getGenerationProvider(): GenerationProvider {
    return this.generationProvider;
  }

  isConfigured(): boolean {
    if (this.embeddingProvider === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      if (this.embeddingProvider === "openai") {
        return await this.openAi.embedTexts(texts);
      }
      if (this.embeddingProvider === "ollama") {
        return await this.ollama.embedTexts(texts);
      }
      return await this.hashing.embedTexts(texts);
    } catch (error) {
      throw new EmbeddingUnavailableError(
        `Embedding provider "${this.embeddingProvider}" failed: ${describeError(error)}`,
      );
    }
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedTexts([text]);
    if (!vector) {
      throw new EmbeddingUnavailableError(
        `Embedding provider "${this.embeddingProvider}" returned no vector.`,
      );
    }
    return vector;
  }

  isAvailable(): boolean {
    if (this.generationProvider === "template") {
      return false;
    }
    if (this.generationProvider === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  async generate(prompt: string, variantCount: number, signal?: AbortSignal): Promise<string[]> {
    if (this.generationProvider === "openai") {
      return this.openAi.generate(prompt, variantCount, signal);
    }
    if (this.generationProvider === "ollama") {
      return this.ollama.generate(prompt, variantCount, signal);
    }
    return [];
  }
}
