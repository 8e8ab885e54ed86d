/**
 * Attestation API entry point
 */

import { logger, config } from '@attestation/shared';
import { createApp } from './app';
import { ContentUnderstandingClient } from './lib/content-understanding';
import { PgDoctorRegistry, PgFraudCaseStore, checkDatabase, pool } from './lib/db';

const app = createApp({
  analyzer: new ContentUnderstandingClient({
    endpoint: config.analyzerEndpoint,
    apiKey: config.analyzerApiKey,
    apiVersion: config.analyzerApiVersion,
    analyzerIds: config.analyzerIds,
    timeoutMs: config.analyzerTimeoutMs,
    pollIntervalMs: config.analyzerPollIntervalMs,
  }),
  registry: new PgDoctorRegistry(pool),
  caseStore: new PgFraudCaseStore(pool),
  workflowOptions: {
    analyzerTimeoutMs: config.analyzerTimeoutMs,
    dbCallTimeoutMs: config.dbCallTimeoutMs,
    requireLocationMatch: config.fuzzyRequireLocationMatch,
    submissionChannel: config.submissionChannel,
  },
  healthCheck: () => checkDatabase(pool),
});

if (!config.analyzerEndpoint) {
  logger.warn('CONTENT_UNDERSTANDING_ENDPOINT is not set; uploads will fail with a technical error');
}

const server = app.listen(config.port, () => {
  logger.info('Attestation API started', { port: config.port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
