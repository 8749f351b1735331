import 'reflect-metadata';

import { bootstrap } from './bootstrap';

// Check for silent flag (from command line or environment variable)
const isSilent =
  process.argv.includes('--silent') ||
  process.argv.includes('-s') ||
  process.env.SILENT === 'true';

if (isSilent) {
  // Only errors get through
  process.env.LOG_LEVEL = 'error';

  console.log = () => {};
  console.info = () => {};
  console.warn = () => {};
  console.debug = () => {};
}

bootstrap().catch((error) => {
  console.error('Fatal error starting frame ingest service', error);
  process.exit(1);
});
