#!/usr/bin/env node

import { runCli } from './cli.js';
import { isEntryPoint } from './utils/entryPoint.js';

/**
 * Main entry point for ha-config-sync
 */
async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

// Only run when executed directly, not when imported
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((error) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
  });
}

export { runCli, parseArgs } from './cli.js';
export * from './errors/syncErrors.js';
export * from './config/syncConfig.js';
export * from './rules/RuleSet.js';
export * from './sync/TreeScanner.js';
export * from './sync/SyncPlanner.js';
export * from './sync/SyncExecutor.js';
export * from './sync/SyncController.js';
export * from './transfer/TransferPrimitive.js';
export * from './transfer/RsyncTransfer.js';
export * from './transfer/LocalTransfer.js';
export * from './reload/ReloadClient.js';
