
/** Serializes work per actor so a quota check and the creation it guards cannot interleave. */
export interface ActorLock {
  withLock<T>(actor: string, work: () => Promise<T>): Promise<T>;
}

export class InMemoryActorLock implements ActorLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(actor: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(actor) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(actor, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(actor) === tail) {
        this.tails.delete(actor);
      }
    }
  }
}

export type LockConnection = {
  query(text: string, values: unknown[]): Promise<unknown>;
  release(): void;
};

export type LockConnectionSource = {
  connect(): Promise<LockConnection>;
};

/** Bounds how many callers run at once; a finishing caller hands its slot to the next waiter. */
class Slots {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly size: number) {}

  async run<T>(work: () => Promise<T>): Promise<T> {
    if (this.active < this.size) {
      this.active += 1;
    } else {
      await new Promise<void>((resolve) => {
        this.waiting.push(resolve);
      });
    }
    try {
      return await work();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active -= 1;
      }
    }
  }
}

/**
 * Session-level advisory lock held on a dedicated connection for the duration of `work`.
 * `work` queries through the same pool, so waiters queue in process first: one
 * connection per actor, and at most `maxHeldConnections` lock connections overall.
 * Keep that below the pool size.
 */
export class PostgresActorLock implements ActorLock {
  private readonly local = new InMemoryActorLock();
  private readonly slots: Slots;

  constructor(
    private readonly db: LockConnectionSource,
    maxHeldConnections: number
  ) {
    this.slots = new Slots(Math.max(1, Math.floor(maxHeldConnections)));
  }

  withLock<T>(actor: string, work: () => Promise<T>): Promise<T> {
    return this.local.withLock(actor, () => this.slots.run(() => this.holdAdvisoryLock(actor, work)));
  }

  private async holdAdvisoryLock<T>(actor: string, work: () => Promise<T>): Promise<T> {
    const client = await this.db.connect();
    try {
      await client.query("SELECT pg_advisory_lock(hashtext($1))", [actor]);
      try {
        return await work();
      } finally {
        await client.query("SELECT pg_advisory_unlock(hashtext($1))", [actor]);
      }
    } finally {
      client.release();
    }
  }
}
