#!/usr/bin/env node
/**
 * WebSocket Bridge Entry Point
 */

import { resolveConfigPath } from '../lib/config.js';
import { WebSocketBridgeServer } from './bridge.js';

async function main(): Promise<void> {
  const server = new WebSocketBridgeServer({
    configPath: resolveConfigPath(),
    handleProcessEvents: true,
  });
  await server.initialize();
  await server.start();
  await server.waitForStop();
  process.exit(0);
}

main().catch((error) => {
  console.error('Failed to start WebSocket bridge:', error);
  process.exit(1);
});
