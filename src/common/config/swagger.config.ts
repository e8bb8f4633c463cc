import { DocumentBuilder } from '@nestjs/swagger';

export const swaggerConfig = new DocumentBuilder()
  .setTitle('Dev Profile MCP')
  .setDescription(
    'Model Context Protocol endpoint exposing GitHub and LeetCode profile aggregation tools ' +
      'and a hangman game. Send JSON-RPC messages to /mcp using the streamable HTTP transport.',
  )
  .setVersion('1.0.0')
  .addBearerAuth({
    type: 'http',
    scheme: 'bearer',
    description: 'The AUTH_TOKEN configured on the server.',
  })
  .build();
