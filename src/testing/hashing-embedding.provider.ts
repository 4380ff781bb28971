import { createHash } from 'crypto';
import { delay } from '../common/utils/retry';
import {
  EmbeddingInput,
  EmbeddingProvider,
  EmbedOptions,
  IEmbeddingProvider,
} from '../providers/interfaces';

function digest(value: string | Buffer): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Deterministic stand-in for an embedding model. Text becomes a hashed
 * bag of words, so texts sharing words score higher; media bytes become
 * a hash-derived positive vector.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly inputs: EmbeddingInput[] = [];
  private readonly failures: Error[] = [];
  mediaSupported = true;
  latencyMs = 0;

  get calls(): number {
    return this.inputs.length;
  }

  /**
   * Fail the next calls with these errors, in order
   */
  failWith(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  getProviderName(): EmbeddingProvider {
    return EmbeddingProvider.GEMINI;
  }

  getModelName(): string {
    return 'hashing-test-model';
  }

  supportsInput(input: EmbeddingInput): boolean {
    return input.kind === 'text' || this.mediaSupported;
  }

  async embed(input: EmbeddingInput, options: EmbedOptions): Promise<number[]> {
    this.inputs.push(input);
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }

    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    return input.kind === 'text'
      ? this.embedText(input.text, options.dimension)
      : this.embedBytes(input.data, options.dimension);
  }

  private embedText(text: string, dimension: number): number[] {
    const vector = new Array<number>(dimension).fill(0);
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (!token) continue;
      vector[digest(token).readUInt32BE(0) % dimension] += 1;
    }
    return vector;
  }

  private embedBytes(data: Buffer, dimension: number): number[] {
    const hash = digest(data);
    return Array.from({ length: dimension }, (_, i) => hash[i % hash.length] / 255 + 0.01);
  }
}
