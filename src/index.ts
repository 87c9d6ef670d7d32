#!/usr/bin/env node

import { loadConfig } from './config.js';
import { TempochainServer } from './mcp/server.js';

const config = loadConfig();

console.error('Starting Tempochain MCP server v0.1.0');
console.error(
  `Windows: ${config.chunkSizeDays} days, layers: ${config.layerDurationDays} days, ` +
    `weights: ${config.weights.connectivity}/${config.weights.attention}/${config.weights.recency}`
);

const server = new TempochainServer(config);

const shutdown = (): void => {
  console.error('\nShutting down...');
  server
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Shutdown error:', error);
      process.exit(1);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

server.run().catch((error: unknown) => {
  console.error('Server error:', error);
  process.exit(1);
});
