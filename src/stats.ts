import type { QuestionCount, SubmissionCount, UserProfile } from './leetcode.js';

export type Difficulty = 'Easy' | 'Medium' | 'Hard';

export interface DifficultyTotals {
  all: number;
  easy: number;
  medium: number;
  hard: number;
}

export interface ContestStats {
  rating: number;
  attended: number;
  globalRanking: number;
  topPercentage: number | null;
}

export interface Stats {
  username: string;
  ranking: number;
  solved: number;
  easy: number;
  medium: number;
  hard: number;
  /** Accepted submissions as a percentage of all submissions, two decimals. */
  acceptanceRate: number;
  /** Questions available on the site, per difficulty. */
  totals: DifficultyTotals;
  contest: ContestStats | null;
}

function countFor(items: Array<QuestionCount | SubmissionCount>, difficulty: 'All' | Difficulty): number {
  return items.find(item => item.difficulty === difficulty)?.count ?? 0;
}

function submissionsFor(items: SubmissionCount[], difficulty: 'All' | Difficulty): number {
  return items.find(item => item.difficulty === difficulty)?.submissions ?? 0;
}

export function calculateAcceptanceRate(accepted: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((accepted / total) * 10_000) / 100;
}

export function parseStats(profile: UserProfile): Stats {
  const { matchedUser, allQuestionsCount, userContestRanking } = profile;
  const { acSubmissionNum, totalSubmissionNum } = matchedUser.submitStats;

  // LeetCode reports a zeroed ranking for users who never entered a contest
  const contest = userContestRanking && userContestRanking.attendedContestsCount > 0
    ? {
        rating: userContestRanking.rating,
        attended: userContestRanking.attendedContestsCount,
        globalRanking: userContestRanking.globalRanking,
        topPercentage: userContestRanking.topPercentage,
      }
    : null;

  return {
    username: matchedUser.username,
    ranking: matchedUser.profile.ranking,
    solved: countFor(acSubmissionNum, 'All'),
    easy: countFor(acSubmissionNum, 'Easy'),
    medium: countFor(acSubmissionNum, 'Medium'),
    hard: countFor(acSubmissionNum, 'Hard'),
    acceptanceRate: calculateAcceptanceRate(
      submissionsFor(acSubmissionNum, 'All'),
      submissionsFor(totalSubmissionNum, 'All')
    ),
    totals: {
      all: countFor(allQuestionsCount, 'All'),
      easy: countFor(allQuestionsCount, 'Easy'),
      medium: countFor(allQuestionsCount, 'Medium'),
      hard: countFor(allQuestionsCount, 'Hard'),
    },
    contest,
  };
}
