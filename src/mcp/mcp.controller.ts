import { Controller, Delete, Get, Post, Req, Res, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { BearerTokenGuard } from '../common/guards/bearer-token.guard';
import type { AuthenticatedRequest } from '../common/guards/bearer-token.guard';
import { McpService } from './mcp.service';

// Responses are written by the MCP transport, hence @Res() everywhere
@ApiTags('MCP')
@ApiBearerAuth()
@UseGuards(BearerTokenGuard)
@Controller('mcp')
export class McpController {
  constructor(private readonly mcpService: McpService) {}

  @Post()
  @ApiOperation({ summary: 'Send a JSON-RPC message (an initialize request opens a session)' })
  async handlePost(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    await this.mcpService.handlePost(req, res);
  }

  @Get()
  @ApiOperation({ summary: 'Open the server-sent event stream for an existing session' })
  async handleStream(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    await this.mcpService.handleSessionRequest(req, res);
  }

  @Delete()
  @ApiOperation({ summary: 'Terminate a session' })
  async handleDelete(@Req() req: AuthenticatedRequest, @Res() res: Response): Promise<void> {
    await this.mcpService.handleSessionRequest(req, res);
  }
}
