import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResult, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { EnvironmentVariables } from '../common/config/env.validation';
import { HangmanSession } from '../hangman/hangman-session';
import { HangmanService } from '../hangman/hangman.service';
import { ProfilesService } from '../profiles/services/profiles.service';
import { TOOL_DESCRIPTIONS } from './tool-descriptions';

export const MCP_SERVER_INFO = { name: 'dev-profile-mcp', version: '1.0.0' } as const;

@Injectable()
export class McpToolsService {
  private readonly logger = new Logger(McpToolsService.name);

  constructor(
    private readonly config: ConfigService<EnvironmentVariables, true>,
    private readonly profiles: ProfilesService,
    private readonly hangman: HangmanService,
  ) {}

  /**
   * Builds the server for one MCP session. Hangman tools close over
   * `session`; profile tools keep no state between calls.
   */
  createServer(session: HangmanSession): McpServer {
    const server = new McpServer(MCP_SERVER_INFO);

    server.registerTool('validate', { description: TOOL_DESCRIPTIONS.validate }, () => this.validate());

    server.registerTool(
      'get_github_profile_data',
      {
        description: TOOL_DESCRIPTIONS.githubProfile,
        inputSchema: { username_or_url: z.string().describe('GitHub username or full profile URL') },
      },
      ({ username_or_url }, { signal }) => this.getGithubProfileData(username_or_url, signal),
    );

    server.registerTool(
      'get_leetcode_profile_data',
      {
        description: TOOL_DESCRIPTIONS.leetcodeProfile,
        inputSchema: { username: z.string().describe('LeetCode username') },
      },
      ({ username }, { signal }) => this.getLeetcodeProfileData(username, signal),
    );

    server.registerTool('start_new_game', { description: TOOL_DESCRIPTIONS.startNewGame }, () =>
      this.run(async () => this.hangman.startNewGame(session)),
    );

    server.registerTool(
      'user_tool_make_guess',
      {
        description: TOOL_DESCRIPTIONS.makeGuess,
        inputSchema: { letter: z.string().describe('The letter to guess (single character)') },
      },
      ({ letter }) => this.run(async () => this.hangman.makeGuess(session, letter)),
    );

    server.registerTool('get_game_status', { description: TOOL_DESCRIPTIONS.gameStatus }, () =>
      this.run(async () => this.hangman.getStatus(session)),
    );

    server.registerTool('game_rules', { description: TOOL_DESCRIPTIONS.gameRules }, () =>
      this.run(async () => this.hangman.rules()),
    );

    return server;
  }

  // ===========================================================================
  // TOOL HANDLERS
  // ===========================================================================
  validate(): Promise<CallToolResult> {
    return this.run(async () => this.config.get('MY_NUMBER', { infer: true }));
  }

  getGithubProfileData(usernameOrUrl: string, signal?: AbortSignal): Promise<CallToolResult> {
    return this.run(async () => {
      const profile = await this.profiles.getGithubProfileData(usernameOrUrl, signal);
      return JSON.stringify(profile, null, 2);
    });
  }

  getLeetcodeProfileData(username: string, signal?: AbortSignal): Promise<CallToolResult> {
    return this.run(async () => {
      const profile = await this.profiles.getLeetcodeProfileData(username, signal);
      return JSON.stringify(profile, null, 2);
    });
  }

  private async run(handler: () => Promise<string>): Promise<CallToolResult> {
    try {
      const text = await handler();
      return { content: [{ type: 'text', text }] };
    } catch (error) {
      throw this.toMcpError(error);
    }
  }

  /**
   * Client-side problems (bad input, unknown user) become INVALID_PARAMS;
   * everything else is reported as INTERNAL_ERROR with its message.
   */
  private toMcpError(error: unknown): McpError {
    if (error instanceof McpError) return error;

    if (error instanceof HttpException && error.getStatus() < 500) {
      return new McpError(ErrorCode.InvalidParams, error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Tool call failed: ${message}`);
    return new McpError(ErrorCode.InternalError, message);
  }
}
