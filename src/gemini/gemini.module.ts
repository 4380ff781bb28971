import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { GeminiEmbeddingService } from './gemini-embedding.service';

/**
 * Module providing the Gemini embedding client
 */
@Module({
  providers: [GeminiService, GeminiEmbeddingService],
  exports: [GeminiService, GeminiEmbeddingService],
})
export class GeminiModule {}
