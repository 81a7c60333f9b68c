import { AnswerGenerationError, AnswerTimeoutError } from './errors.js';
import { describeError, silentLogger, type Logger } from './logger.js';

const PROMPT_TEMPLATE = `You are CultureBot, an expert in world traditions, arts, humanities, and cultural practices across different regions and time periods. You provide informative, balanced, and educational responses about global cultural topics.

Q: {question}
A:`;

const GENERATION_PARAMETERS = {
  max_new_tokens: 512,
  temperature: 0.7,
  top_p: 0.95,
  do_sample: true,
} as const;

export interface AnswerClientOptions {
  apiUrl: string;
  token?: string;
  /** Request timeout in milliseconds. Defaults to 30000 */
  timeoutMs?: number;
  logger?: Logger;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

export type GenerateAnswer = (question: string) => Promise<string>;

export function formatPrompt(question: string): string {
  // A replacer function keeps `$'`, `$&` and friends in the question literal
  return PROMPT_TEMPLATE.replace('{question}', () => question);
}

/**
 * Pull the answer out of a text-generation response.
 * The model echoes the prompt, so everything up to the first `A:` is dropped.
 */
export function extractAnswer(result: unknown): string {
  if (!Array.isArray(result) || result.length === 0) {
    throw new AnswerGenerationError(`Unexpected API response: ${JSON.stringify(result)}`);
  }

  const first: unknown = result[0];
  if (typeof first !== 'object' || first === null || !('generated_text' in first)) {
    throw new AnswerGenerationError(`Unexpected API response format: ${JSON.stringify(result)}`);
  }

  const text = first.generated_text;
  if (typeof text !== 'string') {
    throw new AnswerGenerationError(`Unexpected API response format: ${JSON.stringify(result)}`);
  }

  const marker = text.indexOf('A:');
  return (marker === -1 ? text : text.slice(marker + 2)).trim();
}

/**
 * Creates a function that asks the hosted model one question.
 *
 * @example
 * ```typescript
 * const generate = createAnswerClient({ apiUrl: DEFAULT_HF_API_URL, token: process.env.HF_TOKEN });
 * const answer = await generate('What is the origin of flamenco?');
 * ```
 */
export function createAnswerClient(options: AnswerClientOptions): GenerateAnswer {
  const {
    apiUrl,
    token,
    timeoutMs = 30_000,
    logger = silentLogger,
    fetch: fetchImpl = globalThis.fetch,
  } = options;

  if (!token) {
    logger.warn('HF_TOKEN not found in environment variables. API calls will likely fail.');
  }

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return async function generateAnswer(question: string): Promise<string> {
    logger.info(`Getting answer for question: ${question}`);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(apiUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({ inputs: formatPrompt(question), parameters: GENERATION_PARAMETERS }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        logger.error(`API request failed with status ${response.status}: ${errorText}`);
        throw new AnswerGenerationError(`API request failed with status ${response.status}: ${errorText}`);
      }

      let result: unknown;
      try {
        result = await response.json();
      } catch (error) {
        throw new AnswerGenerationError(`API returned invalid JSON: ${describeError(error)}`, { cause: error });
      }

      return extractAnswer(result);
    } catch (error) {
      if (error instanceof AnswerGenerationError) throw error;
      if (controller.signal.aborted) {
        logger.error(`API request timed out after ${timeoutMs}ms`);
        throw new AnswerTimeoutError(timeoutMs);
      }
      logger.error(`Error connecting to API: ${describeError(error)}`);
      throw new AnswerGenerationError(`Error connecting to API: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  };
}
