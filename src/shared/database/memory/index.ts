import { Repositories } from '../repository.interface';
import { MemoryFleetRepository } from './fleet.repository';
import { MemoryStore } from './memory.store';
import { MemoryTerminalRepository } from './terminal.repository';
import { MemoryUserRepository } from './user.repository';
import { MemoryWalletRepository } from './wallet.repository';

export { MemoryStore } from './memory.store';

export function createMemoryRepositories(store: MemoryStore = new MemoryStore()): Repositories {
  return {
    users: new MemoryUserRepository(store),
    fleet: new MemoryFleetRepository(store),
    wallets: new MemoryWalletRepository(store),
    terminal: new MemoryTerminalRepository(store)
  };
}
