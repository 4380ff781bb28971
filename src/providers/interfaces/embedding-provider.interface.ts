/**
 * Supported embedding providers
 */
export enum EmbeddingProvider {
  GEMINI = 'gemini',
  OPENAI = 'openai',
}

/**
 * What gets embedded: query text, or segment content bytes
 */
export type EmbeddingInput =
  | { kind: 'text'; text: string }
  | { kind: 'media'; data: Buffer; mimeType: string };

export interface EmbedOptions {
  /** Requested output dimensionality */
  dimension: number;
  /** Aborts when the attempt's time budget runs out */
  signal?: AbortSignal;
}

/**
 * An external embedding model. Implementations raise
 * EmbeddingServiceError so callers can tell transient from permanent
 * failures.
 */
export interface IEmbeddingProvider {
  getProviderName(): EmbeddingProvider;
  getModelName(): string;
  supportsInput(input: EmbeddingInput): boolean;
  embed(input: EmbeddingInput, options: EmbedOptions): Promise<number[]>;
}

/**
 * Provider information
 */
export interface ProviderInfo {
  name: EmbeddingProvider;
  modelName: string;
  isAvailable: boolean;
}

export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');
