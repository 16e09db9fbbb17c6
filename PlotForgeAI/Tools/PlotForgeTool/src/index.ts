/*
 * Copyright 2026 Mark Isham
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */


import { Command, InvalidArgumentError, Option } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ErrorHelper, LogHelper, LOG_SEVERITIES } from 'plotforge';
import { createApp } from './app.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './server.js';

// Serves the generate_plot MCP tool over Streamable HTTP at /mcp (default) or stdio.

const DEFAULT_PORT = 9090;

interface ServerOptions {
  logLevel: string;
  transport: 'stdio' | 'http';
  port: number;
  host: string;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

async function runStdio(): Promise<void> {
  const server = createMcpServer();
  await server.connect(new StdioServerTransport());
  LogHelper.Info('MCP server listening on stdio', { server: SERVER_NAME, version: SERVER_VERSION });
}

function runHttp(host: string, port: number): void {
  const app = createApp();
  app.listen(port, host, () => {
    LogHelper.Info(`MCP server listening on ${host}:${port}`, {
      server: SERVER_NAME,
      version: SERVER_VERSION,
      environment: process.env.ENVIRONMENT ?? 'development',
    });
  });
}

async function main(argv: string[]): Promise<void> {
  const envPort = process.env.PORT;
  const program = new Command()
    .name('plotforge-tool')
    .description('MCP server that renders CSV data as PNG charts')
    .version(SERVER_VERSION)
    .addOption(
      new Option('--log-level <level>', 'Set the logging level')
        .choices([...LOG_SEVERITIES])
        .default('INFO')
    )
    .addOption(
      new Option('--transport <type>', 'Transport type for the MCP server')
        .choices(['stdio', 'http'])
        .default('http')
    )
    .addOption(
      new Option('--port <port>', 'HTTP port (http transport only)')
        .argParser(parsePort)
        .default(envPort !== undefined ? parsePort(envPort) : DEFAULT_PORT)
    )
    .option('--host <host>', 'HTTP bind address (http transport only)', '0.0.0.0');

  program.parse(argv);
  const opts = program.opts<ServerOptions>();

  // stdout carries the protocol in stdio mode
  LogHelper.Configure({ level: opts.logLevel, stream: opts.transport === 'stdio' ? 'stderr' : 'stdout' });

  if (opts.transport === 'stdio') {
    await runStdio();
  } else {
    runHttp(opts.host, opts.port);
  }
}

if (require.main === module) {
  main(process.argv).catch(err => {
    ErrorHelper.LogError(err, 'startup');
    process.exit(1);
  });
}
