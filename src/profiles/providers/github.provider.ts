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
import { GithubRawData, ProfileSource } from '../interfaces/profile-source.interface';
import { GithubRepo, GithubUser, GithubUserSchema, parseGithubRepos } from '../schemas/github.schema';
import { REQUEST_TIMEOUT_MS, USER_AGENT } from './upstream.constants';

@Injectable()
export class GithubProvider implements ProfileSource<GithubRawData> {
  readonly source = 'GitHub';
  private readonly logger = new Logger(GithubProvider.name);
  private readonly baseUrl = 'https://api.github.com';

  constructor(private readonly httpService: HttpService) {}

  /**
   * Profile and repository listing are requested together and both are
   * settled before merging. The profile is required; the listing is not,
   * so its failure only empties the repository-derived fields.
   */
  async fetchProfile(handle: string, signal?: AbortSignal): Promise<GithubRawData> {
    const [profileResult, reposResult] = await Promise.allSettled([
      this.getUser(handle, signal),
      this.getRepos(handle, signal),
    ]);

    if (profileResult.status === 'rejected') {
      throw this.toUpstreamError(profileResult.reason, handle);
    }

    let repos: GithubRepo[] = [];
    if (reposResult.status === 'fulfilled') {
      repos = reposResult.value;
    } else {
      const reason = reposResult.reason instanceof Error ? reposResult.reason.message : String(reposResult.reason);
      this.logger.warn(`Repository listing unavailable for ${handle}, continuing without it: ${reason}`);
    }

    return { profile: profileResult.value, repos };
  }

  private async getUser(handle: string, signal?: AbortSignal): Promise<GithubUser> {
    const { data } = await firstValueFrom(
      this.httpService.get<unknown>(`${this.baseUrl}/users/${encodeURIComponent(handle)}`, this.requestConfig(signal)),
    );

    const parsed = GithubUserSchema.safeParse(data);
    if (!parsed.success) {
      throw new BadGatewayException(`${this.source} returned an unexpected profile payload for ${handle}`);
    }
    return parsed.data;
  }

  private async getRepos(handle: string, signal?: AbortSignal): Promise<GithubRepo[]> {
    const { data } = await firstValueFrom(
      this.httpService.get<unknown>(`${this.baseUrl}/users/${encodeURIComponent(handle)}/repos`, {
        ...this.requestConfig(signal),
        params: { per_page: 100 },
      }),
    );
    return parseGithubRepos(data);
  }

  private requestConfig(signal?: AbortSignal) {
    return {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/vnd.github+json',
      },
      timeout: REQUEST_TIMEOUT_MS,
      signal,
    };
  }

  private toUpstreamError(error: unknown, handle: string): HttpException {
    if (error instanceof HttpException) return error;

    if (isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 404) {
        return new NotFoundException(`${this.source} user '${handle}' not found`);
      }
      if (status !== undefined) {
        this.logger.error(`${this.source} profile request for ${handle} failed with status ${status}`);
        return new BadGatewayException(`${this.source} API returned status ${status}`);
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${this.source} profile request for ${handle} failed: ${message}`);
    return new BadGatewayException(`Failed to reach ${this.source} API: ${message}`);
  }
}
