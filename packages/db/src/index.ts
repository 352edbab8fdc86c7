export { initPool, closePool, getPool, withTransaction } from './client';
export { migrate } from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgRunRepository } from './repositories/run-repository';
export { createRunServices, type RunServices } from './services';
