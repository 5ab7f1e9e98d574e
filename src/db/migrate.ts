import { errorMessage, logError, logInfo } from '../utils/logger';
import { SchemaSyncError } from './migrations';
import { schemaSync } from './schemaSync';

schemaSync()
  .then(({ appliedCount, skippedCount, durationMs }) => {
    logInfo('Schema ready', { scope: 'schemaSync', event: 'schema_ready', appliedCount, skippedCount, durationMs });
  })
  .catch((error: unknown) => {
    const file = error instanceof SchemaSyncError ? error.file : null;
    logError('Schema sync failed', { scope: 'schemaSync', event: 'schema_failed', file, error: errorMessage(error) });
    process.exitCode = 1;
  });
