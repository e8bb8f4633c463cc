import { HttpService } from '@nestjs/axios';
import {
  BadGatewayException,
  HttpException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { LeetcodeRawData, ProfileSource } from '../interfaces/profile-source.interface';
import { LeetcodeMatchedUserSchema } from '../schemas/leetcode.schema';
import { REQUEST_TIMEOUT_MS, USER_AGENT } from './upstream.constants';

export const LEETCODE_GRAPHQL_URL = 'https://leetcode.com/graphql';

const USER_PROFILE_QUERY = `query userProfile($username: String!) {
  matchedUser(username: $username) {
    username
    profile {
      ranking
      reputation
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
}`;

interface GraphQLEnvelope {
  data?: { matchedUser?: unknown } | null;
}

@Injectable()
export class LeetcodeProvider implements ProfileSource<LeetcodeRawData> {
  readonly source = 'LeetCode';
  private readonly logger = new Logger(LeetcodeProvider.name);

  constructor(private readonly httpService: HttpService) {}

  async fetchProfile(handle: string, signal?: AbortSignal): Promise<LeetcodeRawData> {
    let envelope: GraphQLEnvelope | null;
    try {
      const { data } = await firstValueFrom(
        this.httpService.post<GraphQLEnvelope | null>(
          LEETCODE_GRAPHQL_URL,
          {
            operationName: 'userProfile',
            query: USER_PROFILE_QUERY,
            variables: { username: handle },
          },
          {
            headers: {
              'Content-Type': 'application/json',
              Referer: 'https://leetcode.com',
              'User-Agent': USER_AGENT,
            },
            timeout: REQUEST_TIMEOUT_MS,
            signal,
          },
        ),
      );
      envelope = data;
    } catch (error) {
      throw this.toUpstreamError(error, handle);
    }

    // LeetCode answers unknown users with 200 and a null matchedUser
    const matchedUser = envelope?.data?.matchedUser;
    if (matchedUser === undefined || matchedUser === null) {
      throw new NotFoundException(`${this.source} user '${handle}' not found`);
    }

    const parsed = LeetcodeMatchedUserSchema.safeParse(matchedUser);
    if (!parsed.success) {
      throw new BadGatewayException(`${this.source} returned an unexpected profile payload for ${handle}`);
    }
    return parsed.data;
  }

  private toUpstreamError(error: unknown, handle: string): HttpException {
    if (error instanceof HttpException) return error;

    if (isAxiosError(error) && error.response) {
      const { status } = error.response;
      this.logger.error(`${this.source} request for ${handle} failed with status ${status}`);
      return new BadGatewayException(`${this.source} API returned status ${status}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${this.source} request for ${handle} failed: ${message}`);
    return new BadGatewayException(`Failed to reach ${this.source} API: ${message}`);
  }
}
