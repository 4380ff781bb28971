import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { getBoolean, getString } from '../config/config.helpers';

/**
 * Service for initializing and providing the Google GenAI client
 */
@Injectable()
export class GeminiService implements OnModuleInit {
  private readonly logger = new Logger(GeminiService.name);
  private client: GoogleGenAI | null = null;
  private embeddingModelName = 'gemini-embedding-001';
  // gemini-embedding-001 takes text only
  private readonly multimodalEmbedding: boolean;

  constructor(private readonly configService: ConfigService) {
    this.multimodalEmbedding = getBoolean(
      this.configService,
      'GEMINI_EMBEDDING_MULTIMODAL',
      false,
    );
  }

  onModuleInit() {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');

    if (!apiKey) {
      this.logger.warn(
        'GEMINI_API_KEY not configured. Gemini provider will not be available.',
      );
      return;
    }

    this.client = new GoogleGenAI({ apiKey });
    this.embeddingModelName = getString(
      this.configService,
      'GEMINI_EMBEDDING_MODEL',
      this.embeddingModelName,
    );

    this.logger.log(
      `Gemini client initialized with embedding model: ${this.embeddingModelName}`,
    );
  }

  /**
   * Check if Gemini is configured and available
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * Get the GoogleGenAI client instance
   */
  getClient(): GoogleGenAI {
    if (!this.client) {
      throw new Error('Gemini is not configured. Please set GEMINI_API_KEY.');
    }
    return this.client;
  }

  getEmbeddingModelName(): string {
    return this.embeddingModelName;
  }

  /**
   * Whether the configured embedding model accepts image and video parts
   */
  embedsMedia(): boolean {
    return this.multimodalEmbedding;
  }

  /**
   * Get the Models API instance for embeddings
   */
  getModelsApi() {
    return this.getClient().models;
  }
}
