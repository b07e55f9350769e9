/**
 * Search the indexed history from the command line.
 *
 * Usage:
 *   npx tsx scripts/search.ts "<query>" [--channel <id>] [--ask]
 *
 * --ask sends the results to the chat model and prints its answer.
 */

import 'dotenv/config';
import { createKnowledgeBot, formatSearchResults, getConfig } from '../src/index.js';
import { createModuleLogger } from '../src/utils/logger.js';
import { getErrorMessage } from '../src/utils/errors.js';

const logger = createModuleLogger('search');

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const channelIndex = args.indexOf('--channel');
  const channelId = channelIndex === -1 ? undefined : args[channelIndex + 1];
  const query = args.find((arg, i) => !arg.startsWith('--') && (channelIndex === -1 || i !== channelIndex + 1));

  if (!query) {
    console.error('Usage: npx tsx scripts/search.ts "<query>" [--channel <id>] [--ask]');
    return 1;
  }

  const bot = createKnowledgeBot(getConfig());

  const stats = await bot.getStats();
  console.log(`Total documents: ${stats.totalDocuments}`);
  if (stats.totalDocuments === 0) {
    console.log('No documents indexed!');
    return 0;
  }

  if (args.includes('--ask')) {
    const answer = await bot.answer(query, channelId);
    if (answer.searchError) {
      console.log(`(search unavailable: ${answer.searchError})`);
    } else if (answer.context) {
      console.log(bot.summarizeContext(answer.context));
    }
    console.log(`\n${answer.text}`);
    return 0;
  }

  const context = await bot.buildContext(query, channelId);
  console.log(bot.summarizeContext(context));
  console.log(`\n${formatSearchResults(context.relevantDocs)}`);
  context.relevantDocs.forEach((r, i) => {
    console.log(`${i + 1}. [${r.metadata.channelName}] score: ${r.score.toFixed(3)}`);
  });
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error(`Search failed: ${getErrorMessage(error)}`);
    process.exit(1);
  });
