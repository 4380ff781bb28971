import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingServiceError } from '../common/errors/pipeline.errors';
import { toEmbeddingServiceError } from '../providers/embedding-error.classifier';
import {
  EmbeddingInput,
  EmbeddingProvider,
  EmbedOptions,
  IEmbeddingProvider,
} from '../providers/interfaces';
import { GeminiService } from './gemini.service';

/**
 * Gemini embeddings. Text is sent as-is; segment content is sent inline
 * with its MIME type, when the configured model is multimodal.
 */
@Injectable()
export class GeminiEmbeddingService implements IEmbeddingProvider {
  private readonly logger = new Logger(GeminiEmbeddingService.name);

  constructor(private readonly geminiService: GeminiService) {}

  getProviderName(): EmbeddingProvider {
    return EmbeddingProvider.GEMINI;
  }

  getModelName(): string {
    return this.geminiService.getEmbeddingModelName();
  }

  supportsInput(input: EmbeddingInput): boolean {
    return input.kind === 'text' || this.geminiService.embedsMedia();
  }

  async embed(input: EmbeddingInput, options: EmbedOptions): Promise<number[]> {
    const startTime = Date.now();

    try {
      const response = await this.geminiService.getModelsApi().embedContent({
        model: this.getModelName(),
        contents:
          input.kind === 'text'
            ? input.text
            : [
                {
                  inlineData: {
                    data: input.data.toString('base64'),
                    mimeType: input.mimeType,
                  },
                },
              ],
        config: {
          outputDimensionality: options.dimension,
          abortSignal: options.signal,
        },
      });

      const values = response.embeddings?.[0]?.values;
      if (!values || values.length === 0) {
        throw new EmbeddingServiceError(
          'permanent',
          'Gemini returned no embedding values',
        );
      }

      this.logger.debug(
        `Embedded ${input.kind} input in ${Date.now() - startTime}ms`,
      );
      return values;
    } catch (error) {
      throw toEmbeddingServiceError(error, 'Gemini');
    }
  }
}
