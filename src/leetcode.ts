import { z } from 'zod';
import { DEFAULT_GRAPHQL_URL, DEFAULT_REQUEST_TIMEOUT_MS } from './config.js';
import { UpdaterError, describeError } from './errors.js';
import { Logger } from './logger.js';

export const USER_PROFILE_QUERY = `query userProfileStats($username: String!) {
  allQuestionsCount {
    difficulty
    count
  }
  matchedUser(username: $username) {
    username
    profile {
      ranking
    }
    submitStats: submitStatsGlobal {
      acSubmissionNum {
        difficulty
        count
        submissions
      }
      totalSubmissionNum {
        difficulty
        count
        submissions
      }
    }
  }
  userContestRanking(username: $username) {
    attendedContestsCount
    rating
    globalRanking
    topPercentage
  }
}`;

const submissionCountSchema = z.object({
  difficulty: z.string(),
  count: z.number().int().nonnegative(),
  submissions: z.number().int().nonnegative(),
});

const matchedUserSchema = z.object({
  username: z.string(),
  profile: z.object({
    ranking: z.number().int().nonnegative(),
  }),
  submitStats: z.object({
    acSubmissionNum: z.array(submissionCountSchema),
    totalSubmissionNum: z.array(submissionCountSchema),
  }),
});

const contestRankingSchema = z.object({
  attendedContestsCount: z.number().int().nonnegative(),
  rating: z.number().nonnegative(),
  globalRanking: z.number().int().nonnegative(),
  topPercentage: z.number().nonnegative().nullable(),
});

const profileDataSchema = z.object({
  allQuestionsCount: z.array(
    z.object({
      difficulty: z.string(),
      count: z.number().int().nonnegative(),
    })
  ),
  matchedUser: matchedUserSchema.nullable(),
  userContestRanking: contestRankingSchema.nullish(),
});

const envelopeSchema = z.object({
  data: z.unknown(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export type SubmissionCount = z.infer<typeof submissionCountSchema>;
export type MatchedUser = z.infer<typeof matchedUserSchema>;
export type ContestRanking = z.infer<typeof contestRankingSchema>;

export interface QuestionCount {
  difficulty: string;
  count: number;
}

export interface UserProfile {
  allQuestionsCount: QuestionCount[];
  matchedUser: MatchedUser;
  userContestRanking: ContestRanking | null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class LeetCodeClient {
  constructor(
    private graphqlUrl: string = DEFAULT_GRAPHQL_URL,
    private timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
    private logger?: Logger
  ) {}

  async fetchUserProfile(username: string): Promise<UserProfile> {
    const payload = await this.query(username);
    return this.parseProfile(payload, username);
  }

  private async query(username: string): Promise<unknown> {
    this.logger?.info('Fetching LeetCode stats from:', this.graphqlUrl);

    let response: Response;
    try {
      response = await fetch(this.graphqlUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Referer': `https://leetcode.com/${username}/`,
        },
        body: JSON.stringify({
          operationName: 'userProfileStats',
          query: USER_PROFILE_QUERY,
          variables: { username },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpdaterError(
        'NetworkFailure',
        `Request to ${this.graphqlUrl} failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new UpdaterError('NetworkFailure', `HTTP error! status: ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new UpdaterError('UnexpectedResponseShape', 'Response body is not valid JSON', { cause: error });
    }
  }

  private parseProfile(payload: unknown, username: string): UserProfile {
    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new UpdaterError('UnexpectedResponseShape', `Unexpected response: ${formatIssues(envelope.error)}`);
    }

    const { errors, data } = envelope.data;
    if (errors && errors.length > 0) {
      throw new UpdaterError(
        'UnexpectedResponseShape',
        `GraphQL error: ${errors.map(e => e.message).join('; ')}`
      );
    }

    const profile = profileDataSchema.safeParse(data);
    if (!profile.success) {
      throw new UpdaterError('UnexpectedResponseShape', `Unexpected response: ${formatIssues(profile.error)}`);
    }

    const { allQuestionsCount, matchedUser, userContestRanking } = profile.data;
    if (!matchedUser) {
      throw new UpdaterError('UnexpectedResponseShape', `No LeetCode user found for "${username}"`);
    }

    this.logger?.debug('Received profile for:', matchedUser.username);
    return {
      allQuestionsCount,
      matchedUser,
      userContestRanking: userContestRanking ?? null,
    };
  }
}
