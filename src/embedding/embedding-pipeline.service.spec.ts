import { ConfigService } from '@nestjs/config';
import {
  EmbeddingServiceError,
  PermanentExternalError,
  TransientExternalError,
} from '../common/errors/pipeline.errors';
import { OperationAbortedError } from '../common/utils/retry';
import { GeminiEmbeddingService } from '../gemini/gemini-embedding.service';
import { GeminiService } from '../gemini/gemini.service';
import { l2Norm } from '../common/utils/vector-math';
import {
  EmbeddingProvider,
  IEmbeddingProvider,
} from '../providers/interfaces';
import { Segment } from '../segments/interfaces/segment.interface';
import { HashingEmbeddingProvider } from '../testing/hashing-embedding.provider';
import { EmbeddingCache } from './embedding-cache';
import { EmbeddingPipelineService } from './embedding-pipeline.service';
import { InMemoryEmbeddingCacheStore } from './stores/in-memory-embedding-cache.store';

const segment: Segment = {
  id: 'seg-1',
  videoId: 'video-1',
  startOffset: 0,
  endOffset: 15,
  cameraId: 'CAM-1',
  location: 'lobby',
  timestamp: Date.UTC(2024, 0, 1, 12),
  contentFlags: { hasFaces: false, hasVehicles: false, motionDetected: true },
};

const video = { data: Buffer.from('fake video bytes'), mimeType: 'video/mp4' };

function build(
  provider: IEmbeddingProvider,
  overrides: Record<string, number> = {},
): EmbeddingPipelineService {
  const config = new ConfigService({
    EMBEDDING_DIMENSION: 8,
    EMBEDDING_TIMEOUT_MS: 500,
    EMBEDDING_MAX_ATTEMPTS: 3,
    EMBEDDING_RETRY_BASE_DELAY_MS: 1,
    EMBEDDING_MAX_CONCURRENCY: 2,
    ...overrides,
  });
  return new EmbeddingPipelineService(
    provider,
    new EmbeddingCache({
      name: 'segments',
      ttlMs: 60_000,
      store: new InMemoryEmbeddingCacheStore(100),
    }),
    new EmbeddingCache({
      name: 'queries',
      ttlMs: 60_000,
      store: new InMemoryEmbeddingCacheStore(100),
    }),
    config,
  );
}

describe('EmbeddingPipelineService', () => {
  let provider: HashingEmbeddingProvider;
  let pipeline: EmbeddingPipelineService;

  beforeEach(() => {
    provider = new HashingEmbeddingProvider();
    pipeline = build(provider);
  });

  describe('embedSegment', () => {
    it('makes one external call for concurrent requests on the same content', async () => {
      provider.latencyMs = 10;

      const results = await Promise.all(
        Array.from({ length: 6 }, () =>
          pipeline.embedSegment(segment, {
            data: Buffer.from(video.data),
            mimeType: video.mimeType,
          }),
        ),
      );

      expect(provider.calls).toBe(1);
      for (const result of results) {
        expect(result.vector).toEqual(results[0].vector);
        expect(result.fingerprint).toBe(results[0].fingerprint);
      }
      expect(results[0].vector).toHaveLength(8);
      expect(l2Norm(results[0].vector)).toBeCloseTo(1);
    });

    it('embeds text content as text', async () => {
      await pipeline.embedSegment(segment, {
        data: Buffer.from('a person walks past'),
        mimeType: 'text/plain',
      });

      expect(provider.inputs).toEqual([{ kind: 'text', text: 'a person walks past' }]);
    });

    it('retries transient failures', async () => {
      provider.failWith(
        new EmbeddingServiceError('transient', 'rate limited', 429),
        new EmbeddingServiceError('transient', 'unavailable', 503),
      );

      const result = await pipeline.embedSegment(segment, video);

      expect(provider.calls).toBe(3);
      expect(result.cacheHit).toBe(false);
    });

    it('surfaces retry exhaustion with the attempt count and caches nothing', async () => {
      provider.failWith(
        new EmbeddingServiceError('transient', 'rate limited', 429),
        new EmbeddingServiceError('transient', 'rate limited', 429),
        new EmbeddingServiceError('transient', 'rate limited', 429),
      );

      const failure = pipeline.embedSegment(segment, video);
      await expect(failure).rejects.toBeInstanceOf(TransientExternalError);
      await expect(failure).rejects.toMatchObject({
        attempts: 3,
        context: { segmentId: 'seg-1' },
      });

      const retried = await pipeline.embedSegment(segment, video);
      expect(retried.cacheHit).toBe(false);
      expect(provider.calls).toBe(4);
    });

    it('does not retry permanent failures', async () => {
      provider.failWith(new EmbeddingServiceError('permanent', 'bad request', 400));

      await expect(pipeline.embedSegment(segment, video)).rejects.toBeInstanceOf(
        PermanentExternalError,
      );
      expect(provider.calls).toBe(1);
    });

    it('treats attempt timeouts as transient', async () => {
      provider.latencyMs = 60;
      const impatient = build(provider, {
        EMBEDDING_TIMEOUT_MS: 20,
        EMBEDDING_MAX_ATTEMPTS: 2,
      });

      await expect(impatient.embedSegment(segment, video)).rejects.toMatchObject({
        attempts: 2,
      });
      expect(provider.calls).toBe(2);
    });

    it('rejects content the provider cannot embed without calling it', async () => {
      provider.mediaSupported = false;

      await expect(pipeline.embedSegment(segment, video)).rejects.toThrow(
        'Provider gemini cannot embed video/mp4 content',
      );
      expect(provider.calls).toBe(0);
    });

    it('rejects empty content', async () => {
      await expect(
        pipeline.embedSegment(segment, { data: Buffer.alloc(0), mimeType: 'video/mp4' }),
      ).rejects.toBeInstanceOf(PermanentExternalError);
    });

    it('rejects video content before calling a text-only Gemini model', async () => {
      const gemini = new GeminiService(new ConfigService({}));
      const modelsApi = jest.spyOn(gemini, 'getModelsApi');

      await expect(
        build(new GeminiEmbeddingService(gemini)).embedSegment(segment, video),
      ).rejects.toThrow('Provider gemini cannot embed video/mp4 content');
      expect(modelsApi).not.toHaveBeenCalled();
    });

    it('rejects vectors of the wrong dimension', async () => {
      const shortVectors: IEmbeddingProvider = {
        getProviderName: () => EmbeddingProvider.OPENAI,
        getModelName: () => 'short',
        supportsInput: () => true,
        embed: async () => [1, 2, 3],
      };

      await expect(build(shortVectors).embedSegment(segment, video)).rejects.toThrow(
        'Embedding has 3 dimensions, expected 8',
      );
    });

    it('rejects all-zero vectors', async () => {
      const zeros: IEmbeddingProvider = {
        getProviderName: () => EmbeddingProvider.OPENAI,
        getModelName: () => 'zeros',
        supportsInput: () => true,
        embed: async () => new Array<number>(8).fill(0),
      };

      await expect(build(zeros).embedSegment(segment, video)).rejects.toBeInstanceOf(
        PermanentExternalError,
      );
    });
  });

  describe('embedQuery', () => {
    it('shares one cache entry across case and whitespace variants', async () => {
      const first = await pipeline.embedQuery('Red Jacket', 'q-1');
      const second = await pipeline.embedQuery('  red   jacket ', 'q-2');

      expect(provider.calls).toBe(1);
      expect(first.normalizedText).toBe('red jacket');
      expect(second.cacheHit).toBe(true);
      expect(second.vector).toEqual(first.vector);
    });

    it('lets a cancelled caller leave while the shared call completes', async () => {
      provider.latencyMs = 30;
      const controller = new AbortController();

      const cancelled = pipeline.embedQuery('person', 'q-1', controller.signal);
      const other = pipeline.embedQuery('person', 'q-2');
      controller.abort();

      await expect(cancelled).rejects.toBeInstanceOf(OperationAbortedError);
      await expect(other).resolves.toMatchObject({ normalizedText: 'person' });
      expect(provider.calls).toBe(1);
    });

    it('rejects blank queries', async () => {
      await expect(pipeline.embedQuery('   ', 'q-1')).rejects.toBeInstanceOf(
        PermanentExternalError,
      );
      expect(provider.calls).toBe(0);
    });
  });
});
