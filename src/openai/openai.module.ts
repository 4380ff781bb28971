import { Module } from '@nestjs/common';
import { OpenAIService } from './openai.service';
import { OpenAIEmbeddingService } from './openai-embedding.service';

@Module({
  providers: [OpenAIService, OpenAIEmbeddingService],
  exports: [OpenAIService, OpenAIEmbeddingService],
})
export class OpenAIModule {}
