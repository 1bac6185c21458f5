import { logger } from '@package-graph/core';
import { run } from './index.js';

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('Fatal error occurred. Exiting.');
  process.exit(1);
});
