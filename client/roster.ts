import type { UserState } from "./api-types";
import type { User } from "./domain-objects";

export type RosterPartition = UserState;

export interface RosterSnapshot {
  readonly online: readonly User[];
  readonly active: readonly User[];
  readonly offline: readonly User[];
  /** Offline friends first, then online, then active. */
  readonly friends: readonly User[];
}

export interface RosterStore {
  readonly snapshot: () => RosterSnapshot;
  readonly friends: () => readonly User[];
  readonly get: (userId: string) => User | null;
  readonly partitionOf: (userId: string) => RosterPartition | null;
  readonly seed: (users: Iterable<User>) => void;
  readonly upsert: (user: User) => User | null;
  readonly remove: (userId: string) => User | null;
  readonly reset: () => void;
}

export const partitionForUser = (user: User): RosterPartition => {
  switch (user.state) {
    case "offline":
      return "offline";
    case "active":
      return "active";
    default:
      return "online";
  }
};

/**
 * Friend roster split by presence. Each partition preserves insertion order
 * and a user id lives in at most one partition.
 */
export class RosterReconciler implements RosterStore {
  private readonly partitions: Record<RosterPartition, Map<string, User>> = {
    online: new Map(),
    active: new Map(),
    offline: new Map(),
  };
  private flattened: readonly User[] = [];

  get size(): number {
    return this.flattened.length;
  }

  snapshot(): RosterSnapshot {
    return {
      online: [...this.partitions.online.values()],
      active: [...this.partitions.active.values()],
      offline: [...this.partitions.offline.values()],
      friends: [...this.flattened],
    };
  }

  friends(): readonly User[] {
    return [...this.flattened];
  }

  get(userId: string): User | null {
    const partition = this.partitionOf(userId);
    return partition ? this.partitions[partition].get(userId) ?? null : null;
  }

  has(userId: string): boolean {
    return this.partitionOf(userId) !== null;
  }

  partitionOf(userId: string): RosterPartition | null {
    if (this.partitions.online.has(userId)) {
      return "online";
    }
    if (this.partitions.active.has(userId)) {
      return "active";
    }
    if (this.partitions.offline.has(userId)) {
      return "offline";
    }
    return null;
  }

  seed(users: Iterable<User>): void {
    this.clearPartitions();
    for (const user of users) {
      this.detach(user.id);
      this.partitions[partitionForUser(user)].set(user.id, user);
    }
    this.recompute();
  }

  /** Moves `user` into the partition its state implies and returns the record it replaced. */
  upsert(user: User): User | null {
    const previous = this.detach(user.id);
    this.partitions[partitionForUser(user)].set(user.id, user);
    this.recompute();
    return previous;
  }

  remove(userId: string): User | null {
    const previous = this.detach(userId);
    if (previous) {
      this.recompute();
    }
    return previous;
  }

  reset(): void {
    this.clearPartitions();
    this.recompute();
  }

  private detach(userId: string): User | null {
    const partition = this.partitionOf(userId);
    if (!partition) {
      return null;
    }
    const entries = this.partitions[partition];
    const previous = entries.get(userId) ?? null;
    entries.delete(userId);
    return previous;
  }

  private clearPartitions(): void {
    this.partitions.online.clear();
    this.partitions.active.clear();
    this.partitions.offline.clear();
  }

  private recompute(): void {
    this.flattened = [
      ...this.partitions.offline.values(),
      ...this.partitions.online.values(),
      ...this.partitions.active.values(),
    ];
  }
}
