#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import 'dotenv/config';
import { loadConfig } from './config.js';
import { mkdir } from './fs.js';
import { createLogger, setLogLevel } from './logger.js';
import { createPipeline, createServer } from './server.js';
import { ConfigurationError } from './types/errors.js';

const logger = createLogger('main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  await mkdir(config.outputFolder);

  const server = createServer({ config, pipeline: createPipeline(config) });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Video translation server running on stdio, saving to ${config.outputFolder}`);
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    logger.error(error.message, { issues: error.issues });
  } else {
    logger.error('Server error', { error });
  }
  process.exit(1);
});
