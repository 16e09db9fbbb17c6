import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

// Tool registry
//
// Each tool lives in its own file in this folder and exports a
// `registerXxxTool(server: McpServer)` function that is called below.

import { registerGeneratePlotTool } from './generatePlot.js';

export function registerTools(server: McpServer) {
  registerGeneratePlotTool(server);
}
