#!/usr/bin/env node
/**
 * isomesh MCP Server
 *
 * Exposes the shape → voxel grid → mesh pipeline as 14 callable tools.
 * Runs over stdio transport; stdout carries the protocol, so logs go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';
import { loadConfig } from './config.js';
import * as session from './session.js';

const config = loadConfig();
session.configure(config);

const server = new McpServer({
  name: 'isomesh',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);

const { shape, grid, mesh } = session.state();
console.error(
  `isomesh: ${shape.name}, ${config.algorithm}, voxel ${grid.voxelSize} → ` +
  `${mesh.triangle_count} triangles. Listening on stdio.`
);
