#!/usr/bin/env node
import { config } from 'dotenv';
import { buildProgram } from './index.js';

config();

buildProgram({ stdin: process.stdin, stdout: process.stdout, env: process.env })
  .parseAsync()
  .catch((err) => {
    console.error('[agent] Fatal error:', err);
    process.exit(1);
  });
