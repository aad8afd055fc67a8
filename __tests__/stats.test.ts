import { describe, test, expect } from 'vitest';
import type { UserProfile } from '../src/leetcode.js';
import { calculateAcceptanceRate, parseStats } from '../src/stats.js';
import { getMockProfileData } from './fixtures.js';

function profile(overrides: Partial<UserProfile> = {}): UserProfile {
  return { ...getMockProfileData(), ...overrides };
}

describe('parseStats', () => {
  test('reduces the profile to the stats record', () => {
    expect(parseStats(profile())).toEqual({
      username: 'test-user',
      ranking: 12345,
      solved: 680,
      easy: 200,
      medium: 400,
      hard: 80,
      acceptanceRate: 62.5,
      totals: { all: 3200, easy: 800, medium: 1600, hard: 800 },
      contest: {
        rating: 1834.5,
        attended: 12,
        globalRanking: 4321,
        topPercentage: 8.25,
      },
    });
  });

  test('counts a missing difficulty as zero', () => {
    const data = profile();
    data.matchedUser.submitStats.acSubmissionNum = [
      { difficulty: 'All', count: 5, submissions: 5 },
      { difficulty: 'Easy', count: 5, submissions: 5 },
    ];

    const stats = parseStats(data);

    expect(stats.solved).toBe(5);
    expect(stats.easy).toBe(5);
    expect(stats.medium).toBe(0);
    expect(stats.hard).toBe(0);
  });

  test('omits contest stats when the user has no ranking', () => {
    expect(parseStats(profile({ userContestRanking: null })).contest).toBeNull();
  });

  test('omits contest stats when no contest was attended', () => {
    const stats = parseStats(profile({
      userContestRanking: {
        attendedContestsCount: 0,
        rating: 1500,
        globalRanking: 0,
        topPercentage: null,
      },
    }));

    expect(stats.contest).toBeNull();
  });
});

describe('calculateAcceptanceRate', () => {
  test('rounds to two decimals', () => {
    expect(calculateAcceptanceRate(1, 3)).toBe(33.33);
    expect(calculateAcceptanceRate(2, 3)).toBe(66.67);
  });

  test('returns zero without submissions', () => {
    expect(calculateAcceptanceRate(0, 0)).toBe(0);
  });
});
