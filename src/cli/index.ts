#!/usr/bin/env node
import 'dotenv/config';
import { main } from './main';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[CLI] Unexpected error:', error);
    process.exitCode = 1;
  },
);
