import { Test, TestingModule } from '@nestjs/testing';
import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { McpToolsService } from './mcp-tools.service';
import { McpHttpRequest, McpService, SESSION_HEADER } from './mcp.service';

const mockClosedSessions: string[] = [];

// Stands in for the streamable HTTP transport: assigns an id on first use,
// echoes it back in the session header and closes itself on DELETE.
jest.mock('@modelcontextprotocol/sdk/server/streamableHttp.js', () => ({
  StreamableHTTPServerTransport: class {
    sessionId?: string;
    onclose?: () => void;

    constructor(
      private readonly options: { sessionIdGenerator: () => string; onsessioninitialized: (id: string) => void },
    ) {}

    async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
      if (this.sessionId === undefined) {
        this.sessionId = this.options.sessionIdGenerator();
        this.options.onsessioninitialized(this.sessionId);
      }
      if (req.method === 'DELETE') {
        await this.close();
      }
      res.setHeader('mcp-session-id', this.sessionId);
      res.writeHead(200).end();
    }

    async close(): Promise<void> {
      if (this.sessionId !== undefined) mockClosedSessions.push(this.sessionId);
      this.onclose?.();
    }
  },
}));

const INITIALIZE = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

const LIST_TOOLS = { jsonrpc: '2.0', id: 2, method: 'tools/list' };

const REJECTION = JSON.stringify({
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
  id: null,
});

function request(method: string, sessionId?: string, body?: unknown): McpHttpRequest {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  if (sessionId !== undefined) req.headers[SESSION_HEADER] = sessionId;
  return Object.assign(req, { body });
}

describe('McpService', () => {
  let service: McpService;
  const tools = { createServer: jest.fn() };

  const send = async (req: McpHttpRequest) => {
    const res = new ServerResponse(req);
    const end = jest.spyOn(res, 'end');
    if (req.method === 'POST') {
      await service.handlePost(req, res);
    } else {
      await service.handleSessionRequest(req, res);
    }
    return { res, end };
  };

  const initialize = async (): Promise<string> => {
    const { res } = await send(request('POST', undefined, INITIALIZE));
    const id = res.getHeader(SESSION_HEADER);
    if (typeof id !== 'string') throw new Error('initialize did not assign a session id');
    return id;
  };

  beforeEach(async () => {
    mockClosedSessions.length = 0;
    tools.createServer.mockReset();
    tools.createServer.mockImplementation(() => ({ connect: jest.fn().mockResolvedValue(undefined) }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [McpService, { provide: McpToolsService, useValue: tools }],
    }).compile();

    service = module.get<McpService>(McpService);
  });

  it('rejects an unknown session id with a JSON-RPC error', async () => {
    const { res, end } = await send(request('POST', 'nope', LIST_TOOLS));

    expect(res.statusCode).toBe(400);
    expect(res.getHeader('content-type')).toBe('application/json');
    expect(end).toHaveBeenCalledWith(REJECTION);
    expect(tools.createServer).not.toHaveBeenCalled();
  });

  it('rejects a non-initialize POST without a session id', async () => {
    const { res, end } = await send(request('POST', undefined, LIST_TOOLS));

    expect(res.statusCode).toBe(400);
    expect(end).toHaveBeenCalledWith(REJECTION);
    expect(service.activeSessions).toBe(0);
  });

  it('rejects an initialize request that names an unknown session', async () => {
    const { res } = await send(request('POST', 'stale', INITIALIZE));

    expect(res.statusCode).toBe(400);
    expect(service.activeSessions).toBe(0);
  });

  it('opens a session with its own server on initialize', async () => {
    const first = await initialize();
    const second = await initialize();

    expect(first).not.toBe(second);
    expect(service.activeSessions).toBe(2);
    expect(tools.createServer).toHaveBeenCalledTimes(2);
  });

  it('routes follow-up requests to the session named in the header', async () => {
    const id = await initialize();

    const { res } = await send(request('POST', id, LIST_TOOLS));

    expect(res.statusCode).toBe(200);
    expect(res.getHeader(SESSION_HEADER)).toBe(id);
    expect(tools.createServer).toHaveBeenCalledTimes(1);
  });

  it('serves GET only for a known session', async () => {
    const id = await initialize();

    const known = await send(request('GET', id));
    const missing = await send(request('GET'));

    expect(known.res.statusCode).toBe(200);
    expect(missing.res.statusCode).toBe(400);
  });

  it('forgets a session once its transport closes', async () => {
    const id = await initialize();

    await send(request('DELETE', id));

    expect(mockClosedSessions).toEqual([id]);
    expect(service.activeSessions).toBe(0);
    const { res } = await send(request('POST', id, LIST_TOOLS));
    expect(res.statusCode).toBe(400);
  });

  it('closes every open session on shutdown', async () => {
    const first = await initialize();
    const second = await initialize();

    await service.onModuleDestroy();

    expect(mockClosedSessions.sort()).toEqual([first, second].sort());
    expect(service.activeSessions).toBe(0);
  });
});
