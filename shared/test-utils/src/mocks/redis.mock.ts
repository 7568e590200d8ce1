/**
 * Redis Mock
 *
 * In-process stand-in for the ioredis client used by RedisAccountStore.
 * Covers the key-value commands the store issues and records every command
 * for assertions.
 */

export interface RedisMockOptions {
  /** Pre-populate mock with initial data */
  initialData?: Map<string, string>;
  /** Reject every command */
  simulateFailures?: boolean;
}

export interface RedisOperation {
  command: string;
  args: unknown[];
}

export class RedisMock {
  private data: Map<string, string>;
  private simulateFailures: boolean;
  private operations: RedisOperation[] = [];

  constructor(options: RedisMockOptions = {}) {
    this.data = new Map(options.initialData);
    this.simulateFailures = options.simulateFailures ?? false;
  }

  async get(key: string): Promise<string | null> {
    this.trackOperation('get', [key]);
    this.checkFailure('get');
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.trackOperation('set', [key, value]);
    this.checkFailure('set');
    this.data.set(key, value);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.trackOperation('del', keys);
    this.checkFailure('del');
    let deleted = 0;
    for (const key of keys) {
      if (this.data.delete(key)) deleted++;
    }
    return deleted;
  }

  async quit(): Promise<'OK'> {
    this.trackOperation('quit', []);
    return 'OK';
  }

  setFailureMode(enabled: boolean): void {
    this.simulateFailures = enabled;
  }

  getOperations(command?: string): RedisOperation[] {
    return command ? this.operations.filter((op) => op.command === command) : [...this.operations];
  }

  /** Raw stored value, bypassing command tracking. */
  peek(key: string): string | undefined {
    return this.data.get(key);
  }

  private trackOperation(command: string, args: unknown[]): void {
    this.operations.push({ command, args });
  }

  private checkFailure(command: string): void {
    if (this.simulateFailures) {
      throw new Error(`Redis ${command} failed: connection lost`);
    }
  }
}

export function createRedisMock(options?: RedisMockOptions): RedisMock {
  return new RedisMock(options);
}
