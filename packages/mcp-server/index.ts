/**
 * Notebook search tool server entry point.
 */

import { main } from './src/server.js';

main().catch((error: unknown) => {
  process.stderr.write(
    `Tool server fatal error: ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
});
