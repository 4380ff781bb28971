import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { getString } from '../config/config.helpers';

/**
 * Service for initializing and providing the OpenAI client
 */
@Injectable()
export class OpenAIService implements OnModuleInit {
  private readonly logger = new Logger(OpenAIService.name);
  private client: OpenAI | null = null;
  private embeddingModelName = 'text-embedding-3-large';

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      this.logger.warn(
        'OPENAI_API_KEY not configured. OpenAI provider will not be available.',
      );
      return;
    }

    // retries are handled by the embedding pipeline
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.embeddingModelName = getString(
      this.configService,
      'OPENAI_EMBEDDING_MODEL',
      this.embeddingModelName,
    );

    this.logger.log(
      `OpenAI client initialized with embedding model: ${this.embeddingModelName}`,
    );
  }

  /**
   * Check if OpenAI is configured and available
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * Get the OpenAI client instance
   */
  getClient(): OpenAI {
    if (!this.client) {
      throw new Error('OpenAI is not configured. Please set OPENAI_API_KEY.');
    }
    return this.client;
  }

  getEmbeddingModelName(): string {
    return this.embeddingModelName;
  }

  /**
   * Get the embeddings API
   */
  getEmbeddingsApi() {
    return this.getClient().embeddings;
  }
}
