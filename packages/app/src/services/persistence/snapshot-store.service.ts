/**
 * Snapshot history service: owns the database connection lifecycle
 */

import { DbSnapshotStore, MemorySnapshotStore } from '@airwatch/aqi-cache';
import type { MetricSnapshot, SnapshotStore } from '@airwatch/contracts';
import { connect, type DbConnection } from '@airwatch/db-simple';
import type { Logger } from '@airwatch/logger';
import type { HealthStatus, Service } from '../../container/types.js';

export interface SnapshotStoreServiceConfig {
  /** `memory:` or `postgres://…` */
  databaseUrl: string;
  logger: Logger;
}

/**
 * SnapshotStore backed by memory or by PostgreSQL, chosen from the database URL.
 * Reads and writes before initialize() reject.
 */
export class SnapshotStoreService implements Service, SnapshotStore {
  readonly name = 'SnapshotStore';
  readonly dependencies: string[] = [];

  private databaseUrl: string;
  private logger: Logger;
  private db?: DbConnection;
  private store?: SnapshotStore;

  constructor(config: SnapshotStoreServiceConfig) {
    this.databaseUrl = config.databaseUrl;
    this.logger = config.logger;
  }

  async initialize(): Promise<void> {
    if (this.databaseUrl === 'memory:') {
      this.store = new MemorySnapshotStore();
      this.logger.info('Snapshot store initialized', { backend: 'memory' });
      return;
    }

    const db = await connect(this.databaseUrl, { logger: this.logger });
    const store = new DbSnapshotStore(db);
    await store.init();

    this.db = db;
    this.store = store;
    this.logger.info('Snapshot store initialized', { backend: db.dbType });
  }

  async shutdown(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = undefined;
    }
    this.store = undefined;
  }

  healthCheck(): HealthStatus {
    return {
      healthy: this.store !== undefined,
      message: this.store ? 'Snapshot store is ready' : 'Snapshot store not initialized',
      details: { backend: this.db?.dbType ?? (this.store ? 'memory' : null) },
    };
  }

  getLatest(target: string, before?: number): Promise<MetricSnapshot | null> {
    return this.requireStore().then((store) => store.getLatest(target, before));
  }

  getRange(target: string, from: number, to: number): Promise<MetricSnapshot[]> {
    return this.requireStore().then((store) => store.getRange(target, from, to));
  }

  append(snapshot: MetricSnapshot): Promise<void> {
    return this.requireStore().then((store) => store.append(snapshot));
  }

  private async requireStore(): Promise<SnapshotStore> {
    if (!this.store) {
      throw new Error('Snapshot store not initialized');
    }
    return this.store;
  }
}
