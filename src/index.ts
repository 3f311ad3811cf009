#!/usr/bin/env node
// Load environment variables before the configuration is read
import dotenv from 'dotenv';
dotenv.config();

import { runCli } from './cli.js';

runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
}).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Failed to run readiness check:', error);
    process.exitCode = 2;
  }
);
