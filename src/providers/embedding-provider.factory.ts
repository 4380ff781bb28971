import { Injectable, Logger, HttpException, HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getString } from '../config/config.helpers';
import { GeminiService } from '../gemini/gemini.service';
import { GeminiEmbeddingService } from '../gemini/gemini-embedding.service';
import { OpenAIService } from '../openai/openai.service';
import { OpenAIEmbeddingService } from '../openai/openai-embedding.service';
import {
  EmbeddingInput,
  EmbeddingProvider,
  EmbedOptions,
  IEmbeddingProvider,
  ProviderInfo,
} from './interfaces';

/**
 * Selects the embedding provider from configuration, resolved per call.
 *
 * Vectors from different models are not comparable; a fallback to the
 * other provider is only sound while the index is empty.
 */
@Injectable()
export class EmbeddingProviderFactory implements IEmbeddingProvider {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);
  private readonly defaultProvider: EmbeddingProvider;

  constructor(
    private readonly configService: ConfigService,
    private readonly geminiService: GeminiService,
    private readonly geminiEmbedding: GeminiEmbeddingService,
    private readonly openaiService: OpenAIService,
    private readonly openaiEmbedding: OpenAIEmbeddingService,
  ) {
    const configuredProvider = getString(
      this.configService,
      'EMBEDDING_PROVIDER',
      'gemini',
    ).toLowerCase();
    this.defaultProvider =
      configuredProvider === 'openai'
        ? EmbeddingProvider.OPENAI
        : EmbeddingProvider.GEMINI;

    this.logger.log(`Default embedding provider: ${this.defaultProvider}`);
  }

  getDefaultProvider(): EmbeddingProvider {
    return this.defaultProvider;
  }

  /**
   * Get information about available providers
   */
  getAvailableProviders(): ProviderInfo[] {
    return [
      {
        name: EmbeddingProvider.GEMINI,
        modelName: this.geminiService.isAvailable()
          ? this.geminiEmbedding.getModelName()
          : 'not configured',
        isAvailable: this.geminiService.isAvailable(),
      },
      {
        name: EmbeddingProvider.OPENAI,
        modelName: this.openaiService.isAvailable()
          ? this.openaiEmbedding.getModelName()
          : 'not configured',
        isAvailable: this.openaiService.isAvailable(),
      },
    ];
  }

  isProviderAvailable(provider: EmbeddingProvider): boolean {
    return provider === EmbeddingProvider.GEMINI
      ? this.geminiService.isAvailable()
      : this.openaiService.isAvailable();
  }

  /**
   * Resolve the provider to use, falling back to the other one when the
   * default is not configured
   */
  resolveProvider(): IEmbeddingProvider {
    if (this.isProviderAvailable(this.defaultProvider)) {
      return this.providerFor(this.defaultProvider);
    }

    const fallback =
      this.defaultProvider === EmbeddingProvider.GEMINI
        ? EmbeddingProvider.OPENAI
        : EmbeddingProvider.GEMINI;

    if (this.isProviderAvailable(fallback)) {
      this.logger.warn(
        `Default provider ${this.defaultProvider} is not available, falling back to ${fallback}`,
      );
      return this.providerFor(fallback);
    }

    throw new HttpException(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message:
          'No embedding providers are available. Please configure GEMINI_API_KEY or OPENAI_API_KEY.',
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }

  getProviderName(): EmbeddingProvider {
    return this.resolveProvider().getProviderName();
  }

  getModelName(): string {
    return this.resolveProvider().getModelName();
  }

  supportsInput(input: EmbeddingInput): boolean {
    return this.resolveProvider().supportsInput(input);
  }

  embed(input: EmbeddingInput, options: EmbedOptions): Promise<number[]> {
    return this.resolveProvider().embed(input, options);
  }

  private providerFor(provider: EmbeddingProvider): IEmbeddingProvider {
    return provider === EmbeddingProvider.OPENAI
      ? this.openaiEmbedding
      : this.geminiEmbedding;
  }
}
