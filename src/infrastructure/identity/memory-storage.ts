import type { IdentityState, IdentityStorage } from '../../domain/index.js';

/** Non-durable storage. Identity lives as long as the process. */
export class MemoryIdentityStorage implements IdentityStorage {
  private state: IdentityState | null;

  constructor(initial: IdentityState | null = null) {
    this.state = initial;
  }

  async load(): Promise<IdentityState | null> {
    return this.state;
  }

  async save(state: IdentityState): Promise<void> {
    this.state = state;
  }
}
