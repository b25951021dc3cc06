/**
 * Neo4j Graph Client
 *
 * Thin orchestrator that implements the GraphClient interface
 * by delegating to specialized operation modules.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  CreateEntryInput,
  Entity,
  Entry,
  EntryStatusUpdate,
  GraphClient,
  Page,
  Relation,
  TransactionClient
} from '../types';
import { StoreError } from '../types';
import { type CommandContext, runCommand, withRetry } from './errors';
import {
  createEntry,
  createTransactionClient,
  deleteEntity,
  getEntityById,
  getEntry,
  getRelationsForEntity,
  listEntities,
  searchEntities,
  updateEntryStatus
} from './operations';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Configuration for Neo4j connection.
 */
export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
  /** Transaction timeout applied to every unit of work */
  timeoutMs: number;
}

// ============================================================
// CLIENT IMPLEMENTATION
// ============================================================

/**
 * Neo4j implementation of the GraphClient interface.
 *
 * All query logic lives in the operation modules. The client's job is to:
 * 1. Manage the driver lifecycle (connect/disconnect)
 * 2. Delegate operations to the appropriate module
 * 3. Provide the driver, database and timeout to each operation
 */
export class Neo4jGraphClient implements GraphClient {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Get the Neo4j driver instance.
   * Throws if not connected.
   */
  get driver(): Driver {
    if (!this._driver) {
      throw new StoreError('Not connected to Neo4j', 'UNAVAILABLE');
    }
    return this._driver;
  }

  private get ctx(): CommandContext {
    return {
      driver: this.driver,
      database: this.config.database,
      timeoutMs: this.config.timeoutMs
    };
  }

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  async connect(): Promise<void> {
    this._driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password),
      { connectionAcquisitionTimeout: this.config.timeoutMs }
    );

    // Fail-fast: verify connectivity at startup
    try {
      await this.driver.verifyConnectivity({ database: this.config.database });
    } catch (error) {
      throw new StoreError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'UNAVAILABLE',
        error instanceof Error ? error : undefined
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this._driver) {
      return false;
    }
    try {
      await this._driver.verifyConnectivity({ database: this.config.database });
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================
  // SCHEMA MANAGEMENT
  // ============================================================

  async initializeSchema(): Promise<void> {
    await withRetry(async () => {
      const session = this.driver.session({ database: this.config.database });
      try {
        await initializeSchema(session);
      } finally {
        await session.close();
      }
    }, 'initializeSchema');
  }

  // ============================================================
  // ENTRIES
  // ============================================================

  async createEntry(input: CreateEntryInput): Promise<Entry> {
    return createEntry(this.ctx, input);
  }

  async getEntry(id: string): Promise<Entry | null> {
    return getEntry(this.ctx, id);
  }

  async updateEntryStatus(id: string, update: EntryStatusUpdate): Promise<void> {
    return updateEntryStatus(this.ctx, id, update);
  }

  // ============================================================
  // ENTITIES & RELATIONS
  // ============================================================

  async getEntityById(id: string): Promise<Entity | null> {
    return getEntityById(this.ctx, id);
  }

  async listEntities(page: Page): Promise<Entity[]> {
    return listEntities(this.ctx, page);
  }

  async searchEntities(query: string, limit: number): Promise<Entity[]> {
    return searchEntities(this.ctx, query, limit);
  }

  async deleteEntity(id: string): Promise<boolean> {
    return deleteEntity(this.ctx, id);
  }

  async getRelationsForEntity(id: string): Promise<Relation[]> {
    return getRelationsForEntity(this.ctx, id);
  }

  // ============================================================
  // TRANSACTIONS
  // ============================================================

  /**
   * Execute `fn` inside one managed write transaction.
   * The driver commits when `fn` resolves and rolls back when it throws.
   */
  async executeTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T> {
    return runCommand(
      this.ctx,
      'write',
      (tx) => fn(createTransactionClient(tx)),
      'executeTransaction'
    );
  }
}
