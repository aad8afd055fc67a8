import type { Stats } from './stats.js';

export const PROGRESS_BAR_LENGTH = 20;

export interface FormatOptions {
  /** Adds a "Last updated" line; leave unset to keep runs byte-identical. */
  updatedAt?: Date;
}

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function createProgressBar(solved: number, total: number, length: number = PROGRESS_BAR_LENGTH): string {
  const ratio = total > 0 ? Math.min(solved / total, 1) : 0;
  const filled = Math.floor(length * ratio);
  const bar = '█'.repeat(filled) + '░'.repeat(length - filled);
  return `\`${bar}\` ${(ratio * 100).toFixed(1)}%`;
}

export function formatStatsBlock(stats: Stats, options: FormatOptions = {}): string {
  const profileUrl = `https://leetcode.com/${stats.username}/`;

  const lines = [
    '### 📊 LeetCode Stats',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| 👤 **Username** | [${stats.username}](${profileUrl}) |`,
    `| 🏅 **Ranking** | #${formatNumber(stats.ranking)} |`,
    `| ✅ **Total Solved** | **${formatNumber(stats.solved)}** |`,
    `| 🎯 **Acceptance Rate** | ${stats.acceptanceRate.toFixed(2)}% |`,
    '',
    '| Difficulty | Solved | Progress |',
    '|------------|--------|----------|',
    `| 🟢 Easy | ${formatNumber(stats.easy)} / ${formatNumber(stats.totals.easy)} | ${createProgressBar(stats.easy, stats.totals.easy)} |`,
    `| 🟡 Medium | ${formatNumber(stats.medium)} / ${formatNumber(stats.totals.medium)} | ${createProgressBar(stats.medium, stats.totals.medium)} |`,
    `| 🔴 Hard | ${formatNumber(stats.hard)} / ${formatNumber(stats.totals.hard)} | ${createProgressBar(stats.hard, stats.totals.hard)} |`,
  ];

  if (stats.contest) {
    const { rating, attended, globalRanking, topPercentage } = stats.contest;
    lines.push(
      '',
      '#### 🏆 Contest',
      '',
      '| Metric | Value |',
      '|--------|-------|',
      `| 📊 **Rating** | ${rating.toFixed(2)} |`,
      `| 🎪 **Contests Attended** | ${formatNumber(attended)} |`,
      `| 🌍 **Global Ranking** | #${formatNumber(globalRanking)} |`,
      `| 📍 **Top Percentage** | ${topPercentage === null ? 'N/A' : `${topPercentage.toFixed(2)}%`} |`
    );
  }

  if (options.updatedAt) {
    lines.push('', `<sub>Last updated: ${formatTimestamp(options.updatedAt)}</sub>`);
  }

  return lines.join('\n');
}
