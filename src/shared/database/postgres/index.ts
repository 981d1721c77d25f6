import { Repositories } from '../repository.interface';
import { PostgresFleetRepository } from './fleet.repository';
import { Database } from './pg.client';
import { PostgresTerminalRepository } from './terminal.repository';
import { PostgresUserRepository } from './user.repository';
import { PostgresWalletRepository } from './wallet.repository';

export { createDatabase, createPool } from './pg.client';
export type { Database } from './pg.client';

export function createPostgresRepositories(database: Database, timeZone: string): Repositories {
  return {
    users: new PostgresUserRepository(database),
    fleet: new PostgresFleetRepository(database),
    wallets: new PostgresWalletRepository(database, timeZone),
    terminal: new PostgresTerminalRepository(database, timeZone)
  };
}
