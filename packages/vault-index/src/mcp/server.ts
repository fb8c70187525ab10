/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import {
  callTool,
  listResources,
  readResource,
  toolDefinitions,
} from './handlers.js';
import type { HandlerContext } from './handlers.js';

const log = createModuleLogger('McpServer');

export const SERVER_NAME = 'vault-index';

export interface McpServerOptions extends HandlerContext {
  version: string;
}

/**
 * MCP server exposing recent notes as resources and the search-notes tool.
 */
export function createMcpServer(options: McpServerOptions): Server {
  const context: HandlerContext = {
    backend: options.backend,
    uriScheme: options.uriScheme,
  };

  const server = new Server(
    { name: SERVER_NAME, version: options.version },
    { capabilities: { resources: {}, tools: {} } },
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () =>
    listResources(context),
  );
  server.setRequestHandler(ReadResourceRequestSchema, async (request) =>
    readResource(context, request.params.uri),
  );
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions,
  }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(context, request.params.name, request.params.arguments),
  );

  return server;
}

/**
 * Serve over stdio until the client disconnects.
 *
 * @returns Resolves once the transport has closed
 */
export async function serveStdio(server: Server): Promise<void> {
  const transport = new StdioServerTransport();
  const closed = new Promise<void>((resolve) => {
    server.onclose = () => resolve();
  });
  await server.connect(transport);
  log.info('connected', { name: SERVER_NAME });

  // The transport does not close on end of input by itself
  process.stdin.once('end', () => {
    server.close().catch((error: unknown) => {
      log.warn('close:failed', { error: errorMessage(error) });
    });
  });
  await closed;
  log.info('disconnected');
}
