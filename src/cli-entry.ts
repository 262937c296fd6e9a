#!/usr/bin/env node
/**
 * CLI entry point for agentmesh.
 */
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { runCli } from './cli/index.js';
import { flushLogger, getRootLogger } from './utils/logger.js';

/**
 * Version from the package manifest beside src/ or dist/.
 */
function readVersion(): string {
  try {
    const manifestPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    getRootLogger().debug({ err: error }, 'Could not read package version');
  }
  return 'unknown';
}

// Handle shutdown gracefully
process.on('SIGINT', () => {
  getRootLogger().info('Received SIGINT, shutting down');
  console.log('\nGoodbye!');
  void flushLogger().finally(() => process.exit(0));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  getRootLogger().fatal({ err: reason }, 'Unhandled promise rejection');
  void flushLogger().finally(() => process.exit(1));
});

runCli(process.argv.slice(2), { version: readVersion() })
  .then(async (code) => {
    await flushLogger();
    process.exitCode = code;
  })
  .catch(async (error: unknown) => {
    getRootLogger().fatal({ err: error }, 'Fatal error in main');
    await flushLogger();
    process.exit(1);
  });
