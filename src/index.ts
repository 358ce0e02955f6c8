#!/usr/bin/env node

import pkg from '../package.json';
import { loadConfig } from './config.js';
import { AppLinksMcpServer } from './server.js';
import { formatErrorForResponse } from './utils/error.js';

async function main() {
  try {
    const args = process.argv.slice(2);
    if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
      console.log(pkg.version);
      return;
    }

    const server = new AppLinksMcpServer({ config: loadConfig() });
    await server.run();
  } catch (error) {
    console.error('Failed to start server:', formatErrorForResponse(error));
    process.exit(1);
  }
}

void main();
