#!/usr/bin/env node

import { getConfig, getPackageInfo, log } from './config.js';
import { createKernel } from './kernel.js';
import { loadProfiles, resolveProfile } from './profiles.js';
import { createProviders } from './tools/index.js';
import { parseHttpArgs } from './httpServer.js';
import { HttpAdapter, StdioAdapter, type TransportAdapter } from './transports/index.js';

async function main(): Promise<void> {
  const config = getConfig();
  const pkg = getPackageInfo();

  log(`Starting ${pkg.name} v${pkg.version}`);
  log(`Environment: ${config.env}`);
  log(`Profile: ${config.profile} (${config.profilesFile})`);

  const profiles = loadProfiles(config.profilesFile);
  const providerIds = resolveProfile(profiles, config.profile);
  const kernel = createKernel(createProviders(providerIds));

  const { httpMode, port, host } = parseHttpArgs(process.argv);
  const adapter: TransportAdapter = httpMode ? new HttpAdapter() : new StdioAdapter();
  await adapter.start(kernel, { port, host });

  const shutdown = (signal: string) => {
    log(`Received ${signal}, shutting down ${adapter.name} transport`);
    adapter.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
