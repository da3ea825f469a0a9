#!/usr/bin/env node
import 'dotenv/config';
import { main } from './cli.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[autoposter] Fatal:', err);
    process.exitCode = 1;
  });
