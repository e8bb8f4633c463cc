import { Module } from '@nestjs/common';
import { HangmanModule } from '../hangman/hangman.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { BearerTokenGuard } from '../common/guards/bearer-token.guard';
import { McpController } from './mcp.controller';
import { McpToolsService } from './mcp-tools.service';
import { McpService } from './mcp.service';

@Module({
  imports: [ProfilesModule, HangmanModule],
  controllers: [McpController],
  providers: [McpService, McpToolsService, BearerTokenGuard],
})
export class McpModule {}
