/**
 * Jest setup: keep structured logs out of test output.
 */

import { setLogLevel } from '@docmeta/shared';

setLogLevel('silent');
