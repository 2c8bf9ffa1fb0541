import { ScoringFailure } from '../../common/errors.js';
import { decodeLabels, TransformerScorer, truncateTokens } from '../transformer/transformerScorer.js';
import { FakeInferenceBackend } from '../../__tests__/helpers.js';

async function failureOf(promise: Promise<unknown>): Promise<ScoringFailure> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ScoringFailure) return error;
    throw error;
  }
  throw new Error('expected a ScoringFailure');
}

describe('decodeLabels', () => {
  test('maps positive labels to positive polarity', () => {
    expect(decodeLabels([{ label: 'POSITIVE', score: 0.9 }, { label: 'NEGATIVE', score: 0.1 }]))
      .toEqual({ polarity: 0.9, confidence: 0.9 });
  });

  test('maps LABEL_0 to negative polarity', () => {
    expect(decodeLabels([{ label: 'LABEL_1', score: 0.2 }, { label: 'LABEL_0', score: 0.8 }]))
      .toEqual({ polarity: -0.8, confidence: 0.8 });
  });

  test('neutral wins with zero polarity', () => {
    expect(decodeLabels([{ label: 'NEUTRAL', score: 0.7 }, { label: 'POSITIVE', score: 0.3 }]))
      .toEqual({ polarity: 0, confidence: 0.7 });
  });

  test('breaks ties by label name', () => {
    expect(decodeLabels([{ label: 'POSITIVE', score: 0.5 }, { label: 'NEGATIVE', score: 0.5 }]))
      .toEqual({ polarity: -0.5, confidence: 0.5 });
  });

  test('rejects unknown labels', () => {
    expect(() => decodeLabels([{ label: 'JOY', score: 1 }])).toThrow(ScoringFailure);
  });
});

describe('truncateTokens', () => {
  test('keeps the first whitespace tokens', () => {
    expect(truncateTokens(' one  two\tthree four ', 3)).toBe('one two three');
  });
});

describe('TransformerScorer', () => {
  test('loads once and batches', async () => {
    const backend = new FakeInferenceBackend();
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 2 });

    const results = await scorer.scoreBatch(['a', 'b', 'c', 'd', 'e']);
    await scorer.score('f');

    expect(results).toHaveLength(5);
    expect(results[0]).toEqual({ polarity: 0.9, confidence: 0.9 });
    expect(backend.loads).toBe(1);
    expect(backend.calls.map(call => call.length)).toEqual([2, 2, 1, 1]);
    expect(scorer.isReady).toBe(true);
  });

  test('truncates input deterministically', async () => {
    const backend = new FakeInferenceBackend();
    const scorer = new TransformerScorer(backend, { maxTokens: 2, batchSize: 8 });

    await scorer.score('Wednesday is good television');

    expect(backend.calls).toEqual([['Wednesday is']]);
  });

  test('a failed load is sticky', async () => {
    const backend = new FakeInferenceBackend(undefined, new Error('model weights unavailable'));
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 2 });

    expect((await failureOf(scorer.score('a'))).reason).toBe('load');
    expect((await failureOf(scorer.score('b'))).reason).toBe('load');
    expect(backend.loads).toBe(1);
    expect(backend.calls).toHaveLength(0);
  });

  test('a warm-up timeout is reported as a load failure', async () => {
    const backend = new FakeInferenceBackend(
      undefined,
      new ScoringFailure('transformer', 'timeout', 'timeout of 50ms exceeded')
    );
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 2 });

    const failure = await failureOf(scorer.load());

    expect(failure.reason).toBe('load');
    expect(failure.message).toBe('timeout of 50ms exceeded');
  });

  test('wraps backend errors as inference failures', async () => {
    const backend = new FakeInferenceBackend(async () => {
      throw new Error('CUDA out of memory');
    });
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 2 });

    const failure = await failureOf(scorer.scoreBatch(['a']));
    expect(failure.reason).toBe('inference');
    expect(failure.model).toBe('transformer');
  });

  test('rejects a response of the wrong length', async () => {
    const backend = new FakeInferenceBackend(async () => [[{ label: 'POSITIVE', score: 1 }]]);
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 4 });

    expect((await failureOf(scorer.scoreBatch(['a', 'b']))).reason).toBe('malformed_response');
  });

  test('rescoring the same text gives the same result', async () => {
    const backend = new FakeInferenceBackend(async texts =>
      texts.map(text => [
        { label: 'POSITIVE', score: text.length / 100 },
        { label: 'NEGATIVE', score: 1 - text.length / 100 }
      ])
    );
    const scorer = new TransformerScorer(backend, { maxTokens: 512, batchSize: 4 });

    expect(await scorer.score('Wednesday is good')).toEqual(await scorer.score('Wednesday is good'));
  });
});
