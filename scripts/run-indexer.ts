/**
 * Manual Indexer Script
 *
 * Run this script to index Slack history into the vector store.
 * Useful for:
 * - Initial indexing of historical messages
 * - Re-indexing after changing the embedding model (--reindex clears first)
 * - Indexing a single channel (--channel C0123456)
 *
 * Usage:
 *   npx tsx scripts/run-indexer.ts [--channel <id>] [--reindex]
 */

import 'dotenv/config';
import { createKnowledgeBot, getConfig } from '../src/index.js';
import { createModuleLogger } from '../src/utils/logger.js';
import { getErrorMessage } from '../src/utils/errors.js';

const logger = createModuleLogger('manual-indexer');

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const channelId = readFlag(args, '--channel');
  const reindex = args.includes('--reindex');

  const config = getConfig();
  const bot = createKnowledgeBot(config);
  const guildId = config.slack.teamId ?? '';

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, stopping indexing at the next batch...`);
    bot.cancelIndexing();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const before = await bot.getStats();
  logger.info(`Documents before indexing: ${before.totalDocuments}`);

  const progressTimer = setInterval(() => {
    const progress = bot.getIndexingProgress();
    if ('status' in progress) {
      logger.info(`Progress: ${progress.status}`);
    }
  }, 5000);

  const result = reindex
    ? await bot.reindex(guildId, channelId)
    : await bot.startIndexing(guildId, channelId);
  clearInterval(progressTimer);

  const after = await bot.getStats();

  logger.info('='.repeat(50));
  logger.info(result.success ? 'Indexing Complete!' : `Indexing did not complete: ${result.message}`);
  if (result.status === 'completed' || result.status === 'cancelled') {
    logger.info(`  • Messages indexed: ${result.indexedMessages}`);
    logger.info(`  • Documents stored: ${result.storedDocuments}`);
  }
  logger.info(`  • Total documents: ${after.totalDocuments}`);
  logger.info('='.repeat(50));

  return result.success ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error(`Indexing failed: ${getErrorMessage(error)}`);
    process.exit(1);
  });
