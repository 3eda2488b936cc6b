export {
  createPool,
  closePool,
  ping,
  type Queryable,
  type QueryResultLike,
  type TransactionalClient,
  type ConnectionSource,
} from './client';
export { PgRepository, buildAssignments, toDate } from './base-repository';
export { applyMigrations, MIGRATIONS_DIR } from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
export { PgContactRepository } from './repositories/contact-repository';
