#!/usr/bin/env node

/**
 * Harvestman CLI
 *
 * Polite page crawling with metadata extraction and topic classification.
 */

import { Command } from 'commander';
import { loadConfig, requireSharedCache, validateConfig } from './config.js';
import { createLogger } from './logger.js';
import { Harvestman } from './harvestman.js';
import { errorMessage } from './errors.js';
import { crawlStatusSchema } from './validation.js';
import { toJsonValue } from './storage/index.js';
import type { CrawlResult, HarvestmanConfig, Logger, Priority } from './types.js';

const VERSION = '1.0.0';

interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

interface CrawlOptions extends CommonOptions {
  priority: Priority;
  delay?: string;
  robots: boolean;
  userAgent?: string;
  header?: string[];
  concurrency?: string;
}

interface ListOptions extends CommonOptions {
  domain?: string;
  status?: string;
  limit: string;
  offset: string;
}

/**
 * Print a value as indented JSON on stdout
 */
function print(value: unknown): void {
  console.log(JSON.stringify(toJsonValue(value), null, 2));
}

function parseHeaders(values: string[] = []): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf(':');
    if (separator <= 0) {
      throw new Error(`Invalid header "${value}", expected "Name: value"`);
    }
    headers[value.slice(0, separator).trim()] = value.slice(separator + 1).trim();
  }
  return headers;
}

function requestOptions(options: CrawlOptions): Record<string, unknown> {
  const request: Record<string, unknown> = {
    priority: options.priority,
    respectRobotsTxt: options.robots,
    headers: parseHeaders(options.header),
  };
  if (options.delay !== undefined) request.crawlDelay = parseFloat(options.delay);
  if (options.userAgent) request.userAgent = options.userAgent;
  return request;
}

function summarize(result: CrawlResult): Record<string, unknown> {
  const { record, metadata } = result;
  return {
    id: record.id,
    url: record.url,
    status: record.status,
    error: record.errorMessage,
    title: metadata?.title,
    description: metadata?.description,
    wordCount: metadata?.wordCount,
    topics: metadata?.topics.map(t => `${t.topic} (${t.confidence.toFixed(2)})`),
    responseTimeMs: metadata?.responseTimeMs,
  };
}

/**
 * Load configuration, run the action against a fresh instance, and always
 * shut it down afterwards.
 */
async function withHarvestman(
  options: CommonOptions,
  action: (harvestman: Harvestman, logger: Logger) => Promise<void>,
  adjust?: (config: HarvestmanConfig) => void
): Promise<void> {
  let logger = createLogger(options.verbose ? 'debug' : 'info');

  try {
    // Load configuration
    const config = loadConfig(options.config);
    adjust?.(config);
    logger = createLogger(options.verbose ? 'debug' : config.logLevel);

    // Validate configuration
    const errors = validateConfig(config);
    if (errors.length > 0) {
      logger.error('Invalid configuration', { errors });
      process.exitCode = 1;
      return;
    }

    const harvestman = new Harvestman(config, logger);

    // Handle graceful shutdown
    const shutdown = (): void => {
      logger.info('Shutting down...');
      harvestman.close().then(
        () => process.exit(130),
        (error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
      await action(harvestman, logger);
    } finally {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      await harvestman.close();
    }
  } catch (error) {
    logger.error('Command failed', { error: errorMessage(error) });
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('harvestman')
  .description('Harvestman - polite page crawler with metadata extraction and topic classification')
  .version(VERSION);

function addCrawlOptions(command: Command): Command {
  return command
    .option('-p, --priority <priority>', 'Priority (low, normal, high)', 'normal')
    .option('-d, --delay <seconds>', 'Minimum delay between requests to the domain')
    .option('--no-robots', 'Ignore robots.txt')
    .option('-a, --user-agent <ua>', 'User agent override')
    .option('-H, --header <header...>', 'Extra request header ("Name: value")')
    .option('--config <path>', 'Path to config file')
    .option('-v, --verbose', 'Enable verbose logging');
}

// Crawl command
addCrawlOptions(
  program.command('crawl <url>').description('Crawl a single URL and print its metadata')
).action(async (url: string, options: CrawlOptions) => {
  await withHarvestman(options, async harvestman => {
    const id = harvestman.submitSingle({ ...requestOptions(options), url });
    const result = await harvestman.waitFor(id);
    print(options.verbose ? result : summarize(result));
    if (result.record.status === 'failed') {
      process.exitCode = 2;
    }
  });
});

// Batch command
addCrawlOptions(
  program.command('batch <urls...>').description('Crawl several URLs under the concurrency gate')
)
  .option('-c, --concurrency <n>', 'Maximum crawls in flight')
  .action(async (urls: string[], options: CrawlOptions) => {
    await withHarvestman(
      options,
      async (harvestman, logger) => {
        const { batchId } = harvestman.submitBatch({ ...requestOptions(options), urls });
        const summary = await harvestman.waitForBatch(batchId);

        logger.info('Batch completed', {
          batchId,
          total: summary.total,
          completed: summary.completed,
          failed: summary.failed,
        });
        print(summary.records.map(record => ({
          id: record.id,
          url: record.url,
          status: record.status,
          error: record.errorMessage,
        })));
      },
      config => {
        if (options.concurrency) {
          config.crawler.concurrency = parseInt(options.concurrency, 10);
        }
      }
    );
  });

// Result command
program
  .command('result <id>')
  .description('Show a stored crawl result')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (id: string, options: CommonOptions) => {
    await withHarvestman(options, async (harvestman, logger) => {
      const result = await harvestman.getResult(id);
      if (!result) {
        logger.warn(`No crawl record ${id}`);
        process.exitCode = 1;
        return;
      }
      print({ ...result, history: harvestman.getHistory(id) });
    });
  });

// List command
program
  .command('list')
  .description('List crawl records, newest first')
  .option('--domain <domain>', 'Only records for this domain')
  .option('--status <status>', 'Only records with this status')
  .option('-l, --limit <n>', 'Maximum records', '20')
  .option('-o, --offset <n>', 'Records to skip', '0')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: ListOptions) => {
    await withHarvestman(options, async harvestman => {
      const status = options.status ? crawlStatusSchema.parse(options.status) : undefined;
      const records = harvestman.listResults({
        domain: options.domain,
        status,
        limit: parseInt(options.limit, 10),
        offset: parseInt(options.offset, 10),
      });
      print(records);
      print(harvestman.getStats().records);
    });
  });

// Delete command
program
  .command('delete <id>')
  .description('Delete a crawl record and its metadata')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (id: string, options: CommonOptions) => {
    await withHarvestman(options, async (harvestman, logger) => {
      const deleted = await harvestman.deleteResult(id);
      if (!deleted) {
        logger.warn(`No crawl record ${id}`);
        process.exitCode = 1;
      }
    });
  });

// Retry command
program
  .command('retry <id>')
  .description('Crawl a failed record again')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (id: string, options: CommonOptions) => {
    await withHarvestman(options, async harvestman => {
      const retryId = harvestman.retry(id);
      print(summarize(await harvestman.waitFor(retryId)));
    });
  });

// Robots command
program
  .command('robots <url>')
  .description('Check whether robots.txt allows a URL')
  .option('-a, --user-agent <ua>', 'User agent to evaluate')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (url: string, options: CommonOptions & { userAgent?: string }) => {
    await withHarvestman(options, async harvestman => {
      const robots = harvestman.getRobots();
      const [allowed, crawlDelay, sitemaps] = await Promise.all([
        robots.canCrawl(url, options.userAgent),
        robots.getCrawlDelay(url, options.userAgent),
        robots.getSitemaps(url),
      ]);
      print({ url, allowed, crawlDelay, sitemaps });
    });
  });

// Domain command
program
  .command('domain <domain>')
  .description('Show rate limit state and recent records for a domain')
  .option('--set-delay <seconds>', 'Store a crawl delay for the domain')
  .option('--reset', 'Forget the rate limit state')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(
    async (domain: string, options: CommonOptions & { setDelay?: string; reset?: boolean }) => {
      const changesState = options.reset === true || options.setDelay !== undefined;
      await withHarvestman(
        options,
        async harvestman => {
          const limiter = harvestman.getRateLimiter();
          if (options.reset) {
            await limiter.resetStats(domain.toLowerCase());
          }
          if (options.setDelay !== undefined) {
            await limiter.setCrawlDelay(domain.toLowerCase(), parseFloat(options.setDelay));
          }
          print(await harvestman.getDomainStats(domain));
        },
        config => {
          if (changesState) {
            requireSharedCache(config, options.reset ? '--reset' : '--set-delay');
          }
        }
      );
    }
  );

// Parse and run
program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
