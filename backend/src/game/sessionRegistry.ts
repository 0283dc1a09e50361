import type { RoundState } from './types';

export interface RoundStore {
  get(sessionKey: string): RoundState | undefined;
  set(sessionKey: string, state: RoundState): void;
  delete(sessionKey: string): void;
  size(): number;
}

export class MemoryRoundStore implements RoundStore {
  private readonly rounds = new Map<string, RoundState>();

  get(sessionKey: string): RoundState | undefined {
    return this.rounds.get(sessionKey);
  }

  set(sessionKey: string, state: RoundState): void {
    this.rounds.set(sessionKey, state);
  }

  delete(sessionKey: string): void {
    this.rounds.delete(sessionKey);
  }

  size(): number {
    return this.rounds.size;
  }
}

/**
 * Maps a chat/session key to its single active round and serializes work per key.
 */
export class SessionRegistry {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly createState: (ownerId: string, ownerLabel: string) => RoundState,
    private readonly store: RoundStore = new MemoryRoundStore(),
  ) {}

  get(sessionKey: string): RoundState | null {
    return this.store.get(sessionKey) ?? null;
  }

  /** Replaces any unfinished round for the key. */
  create(sessionKey: string, ownerId: string, ownerLabel: string): RoundState {
    const state = this.createState(ownerId, ownerLabel);
    this.store.set(sessionKey, state);
    return state;
  }

  remove(sessionKey: string): void {
    this.store.delete(sessionKey);
  }

  size(): number {
    return this.store.size();
  }

  runExclusive<T>(sessionKey: string, task: () => Promise<T> | T): Promise<T> {
    const prev = this.tails.get(sessionKey) ?? Promise.resolve();
    const run = prev.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(sessionKey, tail);

    void tail.then(() => {
      if (this.tails.get(sessionKey) === tail) {
        this.tails.delete(sessionKey);
      }
    });

    return run;
  }
}
