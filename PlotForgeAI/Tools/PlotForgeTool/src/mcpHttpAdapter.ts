import type { Express, Request, Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorHelper, LogHelper } from 'plotforge';

// Stateless Streamable HTTP: every POST gets its own server and transport,
// both closed when the response closes. Replies are plain JSON, not SSE.

export function attachMcpStreamableHttpEndpoint(opts: { app: Express; createServer: () => McpServer; path: string }) {
  const { app, createServer, path } = opts;

  app.post(path, async (req: Request, res: Response) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch(err => ErrorHelper.LogError(err, 'mcp close'));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      ErrorHelper.LogError(err, 'mcp request');
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      }
    }
  });

  // Stateless: no SSE stream (GET) and no session to end (DELETE).
  app.get(path, (_req: Request, res: Response) => {
    LogHelper.Debug('Rejected GET on stateless MCP endpoint');
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed.'));
  });

  app.delete(path, (_req: Request, res: Response) => {
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed.'));
  });
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}
