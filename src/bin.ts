#!/usr/bin/env node
/**
 * pdf-ingest - CLI entry point
 *
 * Usage:
 *   pdf-ingest docs ./papers              # after npm install -g
 *   node dist/src/bin.js docs ./papers    # direct invocation
 *
 * @module bin
 */

import { main } from './cli.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(2);
  });
