import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { Request } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { EnvironmentVariables } from '../config/env.validation';

export type AuthenticatedRequest = Request & { auth?: AuthInfo };

export const MCP_CLIENT_ID = 'mcp-client';

/**
 * Accepts requests whose bearer token matches AUTH_TOKEN and grants the
 * single unrestricted scope. The grant is stored on `request.auth`, where
 * the MCP transport picks it up for tool handlers.
 */
@Injectable()
export class BearerTokenGuard implements CanActivate {
  private readonly logger = new Logger(BearerTokenGuard.name);
  private readonly expected: Buffer;

  constructor(config: ConfigService<EnvironmentVariables, true>) {
    this.expected = Buffer.from(config.get('AUTH_TOKEN', { infer: true }));
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers.authorization;

    const match = header ? /^Bearer\s+(.+)$/i.exec(header) : null;
    if (!match) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const token = match[1].trim();
    const presented = Buffer.from(token);
    if (presented.length !== this.expected.length || !timingSafeEqual(presented, this.expected)) {
      this.logger.warn('Rejected MCP request with an invalid bearer token');
      throw new UnauthorizedException('Invalid bearer token');
    }

    request.auth = { token, clientId: MCP_CLIENT_ID, scopes: ['*'] };
    return true;
  }
}
