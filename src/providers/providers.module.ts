import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { OpenAIModule } from '../openai/openai.module';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EMBEDDING_PROVIDER } from './interfaces';

/**
 * Module that provides the embedding provider selected by configuration.
 * Consumers inject EMBEDDING_PROVIDER.
 */
@Module({
  imports: [GeminiModule, OpenAIModule],
  providers: [
    EmbeddingProviderFactory,
    { provide: EMBEDDING_PROVIDER, useExisting: EmbeddingProviderFactory },
  ],
  exports: [EmbeddingProviderFactory, EMBEDDING_PROVIDER],
})
export class ProvidersModule {}
