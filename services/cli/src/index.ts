/**
 * docmeta CLI entry point
 */

import { logger } from '@docmeta/shared';
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('CLI crashed', error);
    process.exitCode = 2;
  });
