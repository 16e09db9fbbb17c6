import express from 'express';
import type { Express } from 'express';
import { getServerBodyLimit } from 'plotforge';
import { attachMcpStreamableHttpEndpoint } from './mcpHttpAdapter.js';
import { createMcpServer } from './server.js';

export const MCP_PATH = '/mcp';

export function createApp(): Express {
  const app = express();

  // CORS middleware - required for MCP Streamable HTTP when called from browsers and agents
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id, Mcp-Protocol-Version');
    res.header('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }

    next();
  });

  app.use(express.json({ limit: getServerBodyLimit() }));

  // Health check
  app.get('/', (_req, res) => {
    res.json({ status: 'ok' });
  });

  attachMcpStreamableHttpEndpoint({ app, createServer: createMcpServer, path: MCP_PATH });

  return app;
}
