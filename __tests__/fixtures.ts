import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const TEST_USERNAME = 'test-user';
export const TEST_GRAPHQL_URL = 'https://leetcode.test/graphql';

export function getMockProfileData() {
  return {
    allQuestionsCount: [
      { difficulty: 'All', count: 3200 },
      { difficulty: 'Easy', count: 800 },
      { difficulty: 'Medium', count: 1600 },
      { difficulty: 'Hard', count: 800 },
    ],
    matchedUser: {
      username: TEST_USERNAME,
      profile: { ranking: 12345 },
      submitStats: {
        acSubmissionNum: [
          { difficulty: 'All', count: 680, submissions: 900 },
          { difficulty: 'Easy', count: 200, submissions: 300 },
          { difficulty: 'Medium', count: 400, submissions: 500 },
          { difficulty: 'Hard', count: 80, submissions: 100 },
        ],
        totalSubmissionNum: [
          { difficulty: 'All', count: 700, submissions: 1440 },
          { difficulty: 'Easy', count: 210, submissions: 400 },
          { difficulty: 'Medium', count: 410, submissions: 800 },
          { difficulty: 'Hard', count: 80, submissions: 240 },
        ],
      },
    },
    userContestRanking: {
      attendedContestsCount: 12,
      rating: 1834.5,
      globalRanking: 4321,
      topPercentage: 8.25,
    },
  };
}

export function getMockProfileResponse() {
  return { data: getMockProfileData() };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Block rendered for getMockProfileData() without a timestamp. */
export const EXPECTED_BLOCK = [
  '### 📊 LeetCode Stats',
  '',
  '| Metric | Value |',
  '|--------|-------|',
  '| 👤 **Username** | [test-user](https://leetcode.com/test-user/) |',
  '| 🏅 **Ranking** | #12,345 |',
  '| ✅ **Total Solved** | **680** |',
  '| 🎯 **Acceptance Rate** | 62.50% |',
  '',
  '| Difficulty | Solved | Progress |',
  '|------------|--------|----------|',
  `| 🟢 Easy | 200 / 800 | \`${'█'.repeat(5)}${'░'.repeat(15)}\` 25.0% |`,
  `| 🟡 Medium | 400 / 1,600 | \`${'█'.repeat(5)}${'░'.repeat(15)}\` 25.0% |`,
  `| 🔴 Hard | 80 / 800 | \`${'█'.repeat(2)}${'░'.repeat(18)}\` 10.0% |`,
  '',
  '#### 🏆 Contest',
  '',
  '| Metric | Value |',
  '|--------|-------|',
  '| 📊 **Rating** | 1834.50 |',
  '| 🎪 **Contests Attended** | 12 |',
  '| 🌍 **Global Ranking** | #4,321 |',
  '| 📍 **Top Percentage** | 8.25% |',
].join('\n');

export const START_MARKER = '<!-- LEETCODE_STATS_START -->';
export const END_MARKER = '<!-- LEETCODE_STATS_END -->';

export const SAMPLE_README = [
  '# My Profile',
  '',
  'Some intro text.',
  '',
  START_MARKER,
  'stale stats',
  END_MARKER,
  '',
  'Footer text.',
  '',
].join('\n');

export function createTempReadme(content: string = SAMPLE_README): { dir: string; file: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'readme-stats-'));
  const file = path.join(dir, 'README.md');
  fs.writeFileSync(file, content, 'utf-8');
  return { dir, file };
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
