import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { serializeError } from './serialize-error.js';

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  query: string;
  runId?: string;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

/**
 * Brackets a scrape run with `run_started` and `run_completed`/`run_failed`
 * events. Errors are rethrown after logging.
 */
export async function withRunLogger<TResult>({
  logger,
  query,
  runId = randomUUID(),
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = { runId, query };

  logger.info(
    {
      event: 'run_started',
      ...common,
    },
    'Run started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'run_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'run_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
