import { loadConfig, WorkerConfigSchema, createLogger, startHealthBeat } from '@contacts/shared';
import { createPool, closePool, PgRefreshTokenRepository } from '@contacts/db';
import { runRetentionJob } from './jobs/retention';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  const pool = createPool(config.DATABASE_URL);
  const refreshTokenRepo = new PgRefreshTokenRepository(pool);

  const healthBeat = startHealthBeat(5000, config.WORKER_HEALTHCHECK_PATH);

  const sweep = () => {
    runRetentionJob({ refreshTokenRepo, retentionDays: config.REFRESH_TOKEN_RETENTION_DAYS }).catch(
      logJobError('retention'),
    );
  };
  sweep();
  const retentionInterval = setInterval(sweep, config.RETENTION_INTERVAL_MS);

  logger.info({ intervalMs: config.RETENTION_INTERVAL_MS }, 'Worker started');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    clearInterval(retentionInterval);
    await closePool(pool);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error(
      { err: err instanceof Error ? err.message : String(err), job: jobName },
      'Job failed',
    );
  };
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start worker');
  process.exit(1);
});
