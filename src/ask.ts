import type { GenerateAnswer } from './answer-client.js';
import { silentLogger, type Logger } from './logger.js';
import type { AnswerCache } from './types.js';

export interface AskResult {
  answer: string;
  /** True when the answer came from the cache */
  cached: boolean;
}

export interface AskHandlerOptions {
  cache: AnswerCache;
  generate: GenerateAnswer;
  logger?: Logger;
}

export type AskHandler = (question: string) => Promise<AskResult>;

/**
 * Creates the question-answering flow: cache first, model on a miss, then
 * write the answer back.
 *
 * Concurrent asks for a question that is already being generated share the
 * in-flight request rather than calling the model again.
 */
export function createAskHandler(options: AskHandlerOptions): AskHandler {
  const { cache, generate, logger = silentLogger } = options;

  const inFlightRequests = new Map<string, Promise<string>>();

  function generateAndStore(question: string): Promise<string> {
    const inFlight = inFlightRequests.get(question);
    if (inFlight) {
      return inFlight;
    }

    const request = (async (): Promise<string> => {
      try {
        const answer = await generate(question);
        await cache.set(question, answer);
        logger.info(`Answer provided for: ${question}`);
        return answer;
      } finally {
        inFlightRequests.delete(question);
      }
    })();

    inFlightRequests.set(question, request);
    return request;
  }

  return async function ask(question: string): Promise<AskResult> {
    logger.info(`Question received: ${question}`);

    const cachedAnswer = await cache.get(question);
    if (cachedAnswer !== undefined) {
      logger.info(`Cache hit for question: ${question}`);
      return { answer: cachedAnswer, cached: true };
    }

    const answer = await generateAndStore(question);
    return { answer, cached: false };
  };
}
