export type EmbeddingProvider = "hashing" | "ollama" | "openai";
export type GenerationProvider = "template" | "ollama" | "openai";

export interface EmbeddingGateway {
  isConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface GenerationGateway {
  /** False when suggestions should come from the template fallback. */
  isAvailable(): boolean;
  /** `signal` aborts the provider call once the caller stops waiting. */
  generate(prompt: string, variantCount: number, signal?: AbortSignal): Promise<string[]>;
}

export interface AiClient extends EmbeddingGateway, GenerationGateway {
  getEmbeddingProvider(): EmbeddingProvider;
  getGenerationProvider(): GenerationProvider;
}
