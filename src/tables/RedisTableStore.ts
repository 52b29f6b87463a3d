import { Redis, RedisOptions } from "ioredis";
import { TableStore } from "./TableStore";
import {
  ConnectionError,
  ErrorCodes,
  TableStoreError,
  errorMessage,
} from "../errors";

export interface RedisTableStoreOptions {
  // Basic connection options
  host: string;
  port: number;
  password?: string;
  db?: number;
  tls?: RedisOptions["tls"];

  // Storage configuration
  keyPrefix?: string;
  silent?: boolean; // Suppress non-critical messages
}

const PROVIDER = "redis";

/**
 * Table store that keeps each derived table under its own Redis key
 */
export class RedisTableStore implements TableStore {
  private redis: Redis;
  private keyPrefix: string;
  private silent: boolean;

  constructor(options: RedisTableStoreOptions) {
    this.keyPrefix = options.keyPrefix || "file-manifest:table:";
    this.silent = options.silent || false;

    // Configure Redis connection
    const redisOptions: RedisOptions = {
      host: options.host,
      port: options.port,
      password: options.password,
      db: options.db,
      tls: options.tls,
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
    };

    this.redis = new Redis(redisOptions);
  }

  private getTableKey(name: string): string {
    return `${this.keyPrefix}${name}`;
  }

  async tableExists(name: string): Promise<boolean> {
    try {
      const count = await this.redis.exists(this.getTableKey(name));
      return count > 0;
    } catch (error: unknown) {
      throw new ConnectionError(
        `Failed to look up table ${name}: ${errorMessage(error)}`,
        PROVIDER,
      );
    }
  }

  async dropTable(name: string): Promise<void> {
    try {
      const removed = await this.redis.del(this.getTableKey(name));
      if (removed > 0 && !this.silent) {
        console.log(`🧹 Dropped table ${name}`);
      }
    } catch (error: unknown) {
      throw new TableStoreError(
        `Failed to drop table ${name}: ${errorMessage(error)}`,
        ErrorCodes.DROP_FAILED,
        PROVIDER,
      );
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
