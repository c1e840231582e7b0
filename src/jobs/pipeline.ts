// =============================================================================
// Batch Pipeline
// Daily jobs: build the labeling queue, run the LLM annotator, rescore articles
// =============================================================================

import config, { Config, validateConfig } from '../config/default';
import { createServices, Services } from '../container';
import { createPool } from '../database/pool';
import { PostgresSentimentRepository } from '../database/postgresRepository';
import { jobRunDuration } from '../metrics';
import { withRetry } from '../utils/retry';

export type JobName = 'build-queue' | 'llm-eval' | 'rescore';

export interface JobArgs {
  date?: string;
  limit?: number;
}

const JOB_ORDER: JobName[] = ['build-queue', 'llm-eval', 'rescore'];

function isJobName(value: string): value is JobName {
  return JOB_ORDER.some(job => job === value);
}

/** `pipeline <job|all> [date] [limit]`; returns null for an unknown command. */
export function parseArgs(argv: string[]): { jobs: JobName[]; args: JobArgs } | null {
  const [command, date, limit] = argv;
  const jobs = command === 'all' ? JOB_ORDER : command !== undefined && isJobName(command) ? [command] : null;
  if (!jobs) return null;

  const parsedLimit = limit !== undefined ? Number(limit) : undefined;
  if (parsedLimit !== undefined && !Number.isInteger(parsedLimit)) return null;
  return { jobs, args: { date: date || undefined, limit: parsedLimit } };
}

async function runJob(services: Services, job: JobName, args: JobArgs): Promise<unknown> {
  switch (job) {
    case 'build-queue':
      return services.queue.build(args.date, args.limit);
    case 'llm-eval':
      return services.annotator.run({ date: args.date });
    case 'rescore':
      return services.articles.rescore();
  }
}

/**
 * Runs each job with retries on transient storage failures. Jobs are
 * idempotent, so a retried run never duplicates queue items or feedback.
 */
export async function runPipeline(
  services: Services,
  jobs: JobName[],
  args: JobArgs,
  cfg: Config = config,
): Promise<Record<string, unknown>> {
  const results: Record<string, unknown> = {};

  for (const job of jobs) {
    const stopTimer = jobRunDuration.startTimer({ job });
    try {
      results[job] = await withRetry(() => runJob(services, job, args), {
        attempts: cfg.jobs.retryAttempts,
        baseDelayMs: cfg.jobs.retryBaseDelayMs,
        label: `Pipeline:${job}`,
      });
      stopTimer({ status: 'success' });
      console.log(`[Pipeline] ${job} finished: ${JSON.stringify(results[job])}`);
    } catch (error) {
      stopTimer({ status: 'failure' });
      throw error;
    }
  }

  return results;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed) {
    console.log('Usage: pipeline <command> [date] [limit]');
    console.log('');
    console.log('Commands:');
    console.log('  build-queue [date] [limit]  Queue the most uncertain headlines of a crawl date');
    console.log('  llm-eval [date]             Annotate pending queue items with the LLM');
    console.log('  rescore                     Recompute stored article sentiment');
    console.log('  all [date] [limit]          Run every job in order');
    process.exitCode = 1;
    return;
  }

  validateConfig(config);
  const pool = createPool(config.database, 2);
  try {
    const services = createServices(new PostgresSentimentRepository(pool), config);
    await runPipeline(services, parsed.jobs, parsed.args);
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('[Pipeline] Failed:', error);
    process.exit(1);
  });
}
