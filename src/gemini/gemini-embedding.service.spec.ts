import { ConfigService } from '@nestjs/config';
import { GeminiEmbeddingService } from './gemini-embedding.service';
import { GeminiService } from './gemini.service';

const keyframe = { kind: 'media' as const, data: Buffer.from('png bytes'), mimeType: 'image/png' };

describe('GeminiEmbeddingService', () => {
  it('takes text only by default', () => {
    const service = new GeminiEmbeddingService(new GeminiService(new ConfigService({})));

    expect(service.supportsInput({ kind: 'text', text: 'forklift in aisle' })).toBe(true);
    expect(service.supportsInput(keyframe)).toBe(false);
  });

  it('takes media once the model is marked multimodal', () => {
    const service = new GeminiEmbeddingService(
      new GeminiService(new ConfigService({ GEMINI_EMBEDDING_MULTIMODAL: 'true' })),
    );

    expect(service.supportsInput(keyframe)).toBe(true);
  });
});
