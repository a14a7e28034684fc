#!/usr/bin/env node
import pc from 'picocolors';
import { runCli } from './cli.js';

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  console.error(pc.red('Unexpected error:'), error);
  process.exitCode = 1;
}
