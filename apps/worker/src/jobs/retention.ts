import { createLogger, type SafeLogger } from '@contacts/shared';
import { type RefreshTokenRepository } from '@contacts/domain';

export interface RetentionJobDeps {
  refreshTokenRepo: Pick<RefreshTokenRepository, 'deleteExpired'>;
  retentionDays: number;
  logger?: SafeLogger;
}

const defaultLogger = createLogger({ name: 'worker:retention' });

/** Drops refresh tokens that expired or were revoked more than `retentionDays` ago. */
export async function runRetentionJob(deps: RetentionJobDeps): Promise<number> {
  const logger = deps.logger ?? defaultLogger;
  logger.info({}, 'Retention sweep started');

  const deletedTokens = await deps.refreshTokenRepo.deleteExpired(deps.retentionDays);
  if (deletedTokens > 0) {
    logger.info({ count: deletedTokens }, 'Cleaned up expired refresh tokens');
  }

  logger.info({}, 'Retention sweep completed');
  return deletedTokens;
}
