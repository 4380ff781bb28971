import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingServiceError } from '../common/errors/pipeline.errors';
import { toEmbeddingServiceError } from '../providers/embedding-error.classifier';
import {
  EmbeddingInput,
  EmbeddingProvider,
  EmbedOptions,
  IEmbeddingProvider,
} from '../providers/interfaces';
import { OpenAIService } from './openai.service';

/**
 * OpenAI embeddings. The embeddings endpoint takes text only, so segment
 * content is accepted only when it is textual.
 */
@Injectable()
export class OpenAIEmbeddingService implements IEmbeddingProvider {
  private readonly logger = new Logger(OpenAIEmbeddingService.name);

  constructor(private readonly openaiService: OpenAIService) {}

  getProviderName(): EmbeddingProvider {
    return EmbeddingProvider.OPENAI;
  }

  getModelName(): string {
    return this.openaiService.getEmbeddingModelName();
  }

  supportsInput(input: EmbeddingInput): boolean {
    return input.kind === 'text';
  }

  async embed(input: EmbeddingInput, options: EmbedOptions): Promise<number[]> {
    if (input.kind !== 'text') {
      throw new EmbeddingServiceError(
        'permanent',
        `OpenAI embeddings do not accept ${input.mimeType} content`,
      );
    }

    const startTime = Date.now();
    try {
      const response = await this.openaiService.getEmbeddingsApi().create(
        {
          model: this.getModelName(),
          input: input.text,
          dimensions: options.dimension,
        },
        { signal: options.signal },
      );

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new EmbeddingServiceError(
          'permanent',
          'OpenAI returned no embedding',
        );
      }

      this.logger.debug(`Embedded text input in ${Date.now() - startTime}ms`);
      return embedding;
    } catch (error) {
      throw toEmbeddingServiceError(error, 'OpenAI');
    }
  }
}
