#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './runCli.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error(error);
  process.exit(1);
}
