import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { HangmanSession } from '../hangman/hangman-session';
import { McpToolsService } from './mcp-tools.service';

export const SESSION_HEADER = 'mcp-session-id';

/** What the transport reads: the raw request, the parsed body and the guard's grant. */
export type McpHttpRequest = IncomingMessage & { auth?: AuthInfo; body?: unknown };

/**
 * Owns the live MCP sessions. Each session pairs a transport with its own
 * server instance and hangman state; nothing else is shared between them.
 */
@Injectable()
export class McpService implements OnModuleDestroy {
  private readonly logger = new Logger(McpService.name);
  private readonly transports = new Map<string, StreamableHTTPServerTransport>();

  constructor(private readonly tools: McpToolsService) {}

  get activeSessions(): number {
    return this.transports.size;
  }

  async handlePost(req: McpHttpRequest, res: ServerResponse): Promise<void> {
    const sessionId = this.sessionIdOf(req);
    let transport = sessionId ? this.transports.get(sessionId) : undefined;

    if (!transport) {
      if (sessionId || !isInitializeRequest(req.body)) {
        this.rejectSession(res);
        return;
      }
      transport = await this.openSession();
    }

    await transport.handleRequest(req, res, req.body);
  }

  /** GET (server-sent event stream) and DELETE (session termination). */
  async handleSessionRequest(req: McpHttpRequest, res: ServerResponse): Promise<void> {
    const sessionId = this.sessionIdOf(req);
    const transport = sessionId ? this.transports.get(sessionId) : undefined;

    if (!transport) {
      this.rejectSession(res);
      return;
    }
    await transport.handleRequest(req, res);
  }

  async onModuleDestroy(): Promise<void> {
    const open = [...this.transports.values()];
    this.transports.clear();
    await Promise.all(open.map((transport) => transport.close()));
  }

  private async openSession(): Promise<StreamableHTTPServerTransport> {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        this.transports.set(id, transport);
        this.logger.log(`MCP session opened: ${id}`);
      },
    });

    transport.onclose = () => {
      const id = transport.sessionId;
      if (id && this.transports.delete(id)) {
        this.logger.log(`MCP session closed: ${id}`);
      }
    };

    const server = this.tools.createServer(new HangmanSession());
    await server.connect(transport);
    return transport;
  }

  private sessionIdOf(req: McpHttpRequest): string | undefined {
    const value = req.headers[SESSION_HEADER];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }

  private rejectSession(res: ServerResponse): void {
    res.writeHead(400, { 'Content-Type': 'application/json' }).end(
      JSON.stringify({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
        id: null,
      }),
    );
  }
}
