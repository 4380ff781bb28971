import { BadRequestException } from '@nestjs/common';
import {
  FilterValidationError,
  IndexCapacityError,
  TransientExternalError,
} from '../errors/pipeline.errors';
import { describeException } from './http-exception.filter';

describe('describeException', () => {
  it('carries the retry hint of an exhausted embedding call', () => {
    const described = describeException(
      new TransientExternalError('rate limited', { segmentId: 'seg-1' }, 3),
    );

    expect(described).toEqual({
      status: 503,
      message: 'rate limited',
      error: 'TransientExternalError',
      details: { segmentId: 'seg-1', kind: 'transient', attempts: 3 },
      retryAfter: 30,
    });
  });

  it('lists every filter problem', () => {
    const described = describeException(
      new FilterValidationError(['topK must be an integer between 1 and 100']),
    );

    expect(described.status).toBe(400);
    expect(described.message).toEqual(['topK must be an integer between 1 and 100']);
  });

  it('marks a queued capacity failure', () => {
    const described = describeException(
      new IndexCapacityError(2, { segmentId: 'seg-9' }).queued(),
    );

    expect(described.status).toBe(507);
    expect(described.details).toEqual({ segmentId: 'seg-9', capacity: 2, queuedForRetry: true });
  });

  it('uses the Nest default body for built-in exceptions', () => {
    expect(describeException(new BadRequestException('bad field'))).toEqual({
      status: 400,
      message: 'bad field',
      error: 'Bad Request',
      details: undefined,
      retryAfter: undefined,
    });
  });

  it('reports anything else as an internal error', () => {
    expect(describeException(new Error('boom'))).toEqual({
      status: 500,
      message: 'boom',
      error: 'Internal Server Error',
    });
    expect(describeException('odd').message).toBe('An unexpected error occurred');
  });
});
