#!/usr/bin/env node
/**
 * Repository harvester - main entry point
 */

import * as dotenv from 'dotenv';
import { buildProgram } from './cli';

dotenv.config();

process.on('SIGINT', () => {
  console.log('\nOperation interrupted by user');
  process.exit(1);
});

buildProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
