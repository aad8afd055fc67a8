import { UpdaterError } from './errors.js';
import { formatStatsBlock } from './format.js';
import { LeetCodeClient } from './leetcode.js';
import { Logger } from './logger.js';
import { ReadmeWriter } from './readme.js';
import { parseStats, type Stats } from './stats.js';
import type { StatsConfig } from './config.js';

export interface UpdaterOptions {
  dryRun?: boolean;
  showUpdatedAt?: boolean;
  now?: () => Date;
}

export interface UpdateResult {
  stats: Stats;
  block: string;
  changed: boolean;
  readmePath: string;
}

export class StatsUpdater {
  constructor(
    private client: LeetCodeClient,
    private readme: ReadmeWriter,
    private logger: Logger,
    private options: UpdaterOptions = {}
  ) {}

  async run(username: string): Promise<UpdateResult> {
    const trimmed = username.trim();
    if (!trimmed) {
      throw new UpdaterError('ConfigMissing', 'LeetCode username must not be empty');
    }

    this.logger.info(`Fetching LeetCode stats for: ${trimmed}`);
    const profile = await this.client.fetchUserProfile(trimmed);
    const stats = parseStats(profile);

    this.logger.info(`Total solved: ${stats.solved}`);
    this.logger.info(`Easy: ${stats.easy} | Medium: ${stats.medium} | Hard: ${stats.hard}`);
    this.logger.debug('Parsed stats:', stats);

    const now = this.options.now ?? (() => new Date());
    const block = formatStatsBlock(stats, {
      updatedAt: this.options.showUpdatedAt ? now() : undefined,
    });

    const { changed } = this.readme.update(block, { dryRun: this.options.dryRun });

    return { stats, block, changed, readmePath: this.readme.path };
  }
}

export function createUpdater(config: StatsConfig, logger: Logger, dryRun: boolean = false): StatsUpdater {
  const client = new LeetCodeClient(config.graphqlUrl, config.requestTimeoutMs, logger);
  const readme = new ReadmeWriter(
    config.readmePath,
    { start: config.startMarker, end: config.endMarker },
    logger
  );

  return new StatsUpdater(client, readme, logger, {
    dryRun,
    showUpdatedAt: config.showUpdatedAt,
  });
}
