import { BadGatewayException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { HangmanSession } from '../hangman/hangman-session';
import { HangmanService } from '../hangman/hangman.service';
import { ProfilesService } from '../profiles/services/profiles.service';
import { McpToolsService } from './mcp-tools.service';

describe('McpToolsService', () => {
  let service: McpToolsService;
  const profiles = {
    getGithubProfileData: jest.fn(),
    getLeetcodeProfileData: jest.fn(),
  };

  beforeEach(async () => {
    profiles.getGithubProfileData.mockReset();
    profiles.getLeetcodeProfileData.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        McpToolsService,
        HangmanService,
        { provide: ProfilesService, useValue: profiles },
        { provide: ConfigService, useValue: new ConfigService({ MY_NUMBER: '910000000000' }) },
      ],
    }).compile();

    service = module.get<McpToolsService>(McpToolsService);
  });

  it('returns the configured number from validate', async () => {
    await expect(service.validate()).resolves.toEqual({
      content: [{ type: 'text', text: '910000000000' }],
    });
  });

  it('serializes the GitHub record as JSON text', async () => {
    profiles.getGithubProfileData.mockResolvedValue({ username: 'alice', totalStars: 3 });
    const controller = new AbortController();

    const result = await service.getGithubProfileData('https://github.com/alice', controller.signal);

    expect(profiles.getGithubProfileData).toHaveBeenCalledWith('https://github.com/alice', controller.signal);
    expect(result.content).toEqual([{ type: 'text', text: '{\n  "username": "alice",\n  "totalStars": 3\n}' }]);
  });

  it('maps NotFound to INVALID_PARAMS', async () => {
    profiles.getLeetcodeProfileData.mockRejectedValue(new NotFoundException("LeetCode user 'ghost' not found"));

    await expect(service.getLeetcodeProfileData('ghost')).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
      message: expect.stringContaining("LeetCode user 'ghost' not found"),
    });
  });

  it('maps upstream failures to INTERNAL_ERROR with the status in the message', async () => {
    profiles.getGithubProfileData.mockRejectedValue(new BadGatewayException('GitHub API returned status 502'));

    await expect(service.getGithubProfileData('alice')).rejects.toMatchObject({
      code: ErrorCode.InternalError,
      message: expect.stringContaining('GitHub API returned status 502'),
    });
  });

  it('maps unexpected errors to INTERNAL_ERROR', async () => {
    profiles.getGithubProfileData.mockRejectedValue(new TypeError('boom'));

    await expect(service.getGithubProfileData('alice')).rejects.toMatchObject({ code: ErrorCode.InternalError });
  });

  describe('over an MCP connection', () => {
    let client: Client;

    beforeEach(async () => {
      const server = service.createServer(new HangmanSession(['GO'], () => 0));
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      client = new Client({ name: 'test-client', version: '1.0.0' });

      await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    });

    afterEach(async () => {
      await client.close();
    });

    it('lists every tool', async () => {
      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name).sort()).toEqual([
        'game_rules',
        'get_game_status',
        'get_github_profile_data',
        'get_leetcode_profile_data',
        'start_new_game',
        'user_tool_make_guess',
        'validate',
      ]);
    });

    it('publishes descriptions as JSON', async () => {
      const { tools } = await client.listTools();
      const guess = tools.find((tool) => tool.name === 'user_tool_make_guess');

      expect(JSON.parse(guess?.description ?? '{}')).toEqual({
        description: 'Make a letter guess in the current hangman game',
        use_when: 'Use this when the user wants to guess a letter in the hangman game',
        side_effects: 'Updates the game state, reveals letters if correct, or adds to wrong guesses if incorrect',
      });
    });

    it('plays hangman within the session', async () => {
      await client.callTool({ name: 'start_new_game', arguments: {} });
      await client.callTool({ name: 'user_tool_make_guess', arguments: { letter: 'g' } });

      const status = await client.callTool({ name: 'get_game_status', arguments: {} });

      expect(status.content).toEqual([{ type: 'text', text: expect.stringContaining('Word: G _') }]);
    });

    it('reports an unknown user as an invalid-params tool error', async () => {
      profiles.getGithubProfileData.mockRejectedValue(new NotFoundException("GitHub user 'ghost' not found"));

      const result = await client.callTool({ name: 'get_github_profile_data', arguments: { username_or_url: 'ghost' } });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        { type: 'text', text: "MCP error -32602: GitHub user 'ghost' not found" },
      ]);
    });

    it('reports a bad guess as an invalid-params tool error', async () => {
      await client.callTool({ name: 'start_new_game', arguments: {} });

      const result = await client.callTool({ name: 'user_tool_make_guess', arguments: { letter: '7' } });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        { type: 'text', text: 'MCP error -32602: Please guess a single letter only!' },
      ]);
    });

    it('reports upstream failures as internal tool errors', async () => {
      profiles.getLeetcodeProfileData.mockRejectedValue(new BadGatewayException('LeetCode API returned status 503'));

      const result = await client.callTool({ name: 'get_leetcode_profile_data', arguments: { username: 'lee' } });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([
        { type: 'text', text: 'MCP error -32603: LeetCode API returned status 503' },
      ]);
    });
  });
});
