#!/usr/bin/env node
import { program } from 'commander';
import { registerMainCommand } from './cli/commands';
import { CLI_NAME } from './config/constants';
import { loadDotEnv } from './config/dotenv';

// Load environment variables at startup
loadDotEnv();

// Set up Commander program
program
  .name(CLI_NAME)
  .description('Builds a letter to Santa as JSON and XML through interchangeable message builders')
  .version('1.0.0');

registerMainCommand(program);

// Parse command line arguments
program.parse();
