import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createAnswerCache } from '../src/answer-cache.js';
import { createAskHandler } from '../src/ask.js';
import { AnswerGenerationError } from '../src/errors.js';
import { createMemoryStore } from '../src/stores/memory-store.js';
import { createRedisStore } from '../src/stores/redis-store.js';
import { FakeRedis } from './fake-redis.js';

function countingGenerator(answerFor: (question: string) => string = (q) => `answer to ${q}`) {
  const questions: string[] = [];
  const generate = async (question: string): Promise<string> => {
    questions.push(question);
    return answerFor(question);
  };
  return { generate, questions };
}

describe('createAskHandler', () => {
  it('should call the model on a miss and serve the cache afterwards', async () => {
    const { generate, questions } = countingGenerator();
    const ask = createAskHandler({ cache: createAnswerCache({ store: createMemoryStore() }), generate });

    assert.deepStrictEqual(await ask('What is ikebana?'), {
      answer: 'answer to What is ikebana?',
      cached: false,
    });
    assert.deepStrictEqual(await ask('What is ikebana?'), {
      answer: 'answer to What is ikebana?',
      cached: true,
    });
    assert.deepStrictEqual(questions, ['What is ikebana?']);
  });

  it('should not normalize questions', async () => {
    const { generate, questions } = countingGenerator();
    const ask = createAskHandler({ cache: createAnswerCache({ store: createMemoryStore() }), generate });

    await ask('Foo');
    await ask('foo');
    await ask('Foo ');

    assert.deepStrictEqual(questions, ['Foo', 'foo', 'Foo ']);
  });

  it('should share one model call between concurrent asks for the same question', async () => {
    let release: (answer: string) => void = () => {};
    const questions: string[] = [];
    const generate = (question: string) =>
      new Promise<string>((resolve) => {
        questions.push(question);
        release = resolve;
      });
    const ask = createAskHandler({ cache: createAnswerCache({ store: createMemoryStore() }), generate });

    const first = ask('q');
    const second = ask('q');
    // Let both asks pass their cache lookups before the model answers
    await new Promise((resolve) => setImmediate(resolve));
    release('shared');

    assert.deepStrictEqual(await Promise.all([first, second]), [
      { answer: 'shared', cached: false },
      { answer: 'shared', cached: false },
    ]);
    assert.deepStrictEqual(questions, ['q']);
  });

  it('should propagate model errors without caching anything', async () => {
    let fail = true;
    const generate = async (question: string): Promise<string> => {
      if (fail) throw new AnswerGenerationError('API request failed with status 500: boom');
      return `answer to ${question}`;
    };
    const ask = createAskHandler({ cache: createAnswerCache({ store: createMemoryStore() }), generate });

    await assert.rejects(ask('q'), AnswerGenerationError);

    fail = false;
    assert.deepStrictEqual(await ask('q'), { answer: 'answer to q', cached: false });
  });

  it('should keep answering when the cache backend is down', async () => {
    const redis = new FakeRedis();
    redis.failing = true;
    const { generate, questions } = countingGenerator();
    const ask = createAskHandler({
      cache: createAnswerCache({ store: createRedisStore({ client: redis, now: redis.now }) }),
      generate,
    });

    assert.deepStrictEqual(await ask('q'), { answer: 'answer to q', cached: false });
    assert.deepStrictEqual(await ask('q'), { answer: 'answer to q', cached: false });
    assert.deepStrictEqual(questions, ['q', 'q']);
  });
});
