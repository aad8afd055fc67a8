import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { Logger } from './logger.js';
import { createUpdater } from './updater.js';

export const USAGE = `
LeetCode README Stats

Usage:
  stats-updater              - Fetch stats and rewrite the marked README section
  stats-updater --dry-run    - Fetch and format, print the section without writing
  stats-updater --help       - Show this message

Environment:
  LEETCODE_USERNAME (required), README_PATH, LEETCODE_GRAPHQL_URL,
  REQUEST_TIMEOUT_MS, STATS_START_MARKER, STATS_END_MARKER,
  SHOW_UPDATED_AT, LOG_LEVEL, LOG_FILE
`;

export async function main(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.includes('--help')) {
    console.log(USAGE);
    return 0;
  }

  const dryRun = args.includes('--dry-run');
  let logger = new Logger(env.LOG_LEVEL || 'info');

  try {
    const config = loadConfig(env);
    logger = new Logger(config.logLevel, config.logFile);

    logger.info('=== LeetCode stats update started ===');
    const result = await createUpdater(config, logger, dryRun).run(config.username);

    if (dryRun) {
      console.log(result.block);
    }
    logger.info(`=== Update complete (${result.changed ? 'changed' : 'unchanged'}) ===`);
    return 0;
  } catch (error) {
    logger.error(`Update failed: ${describeError(error)}`);
    return 1;
  }
}
