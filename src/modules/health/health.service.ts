import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';

/**
 * Health check result interface
 */
export interface HealthCheckResult {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  services: {
    mongodb: MongoHealth;
  };
}

/**
 * MongoDB health, including the database diagnostics
 */
export interface MongoHealth {
  status: 'up' | 'down';
  state: string;
  latency?: number;
  database?: string;
  collections?: string[];
  error?: string;
}

const MONGO_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

/**
 * HealthService checks the MongoDB connection
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    @InjectConnection()
    private readonly mongoConnection: Connection,
  ) {}

  /**
   * Full health check with database name and collection list
   */
  async check(): Promise<HealthCheckResult> {
    const mongoHealth = await this.checkMongoDB();

    return {
      status: mongoHealth.status === 'up' ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: {
        mongodb: mongoHealth,
      },
    };
  }

  isReady(): boolean {
    return this.mongoConnection.readyState === 1;
  }

  private async checkMongoDB(): Promise<MongoHealth> {
    const start = Date.now();
    const state = this.getMongoStateString(this.mongoConnection.readyState);

    if (!this.isReady()) {
      return {
        status: 'down',
        state,
        error: `Connection state: ${state}`,
      };
    }

    try {
      const db = this.mongoConnection.db;
      if (!db) {
        return { status: 'down', state, error: 'Database handle not initialized' };
      }

      await db.admin().ping();
      const collections = await db.listCollections().toArray();

      return {
        status: 'up',
        state,
        latency: Date.now() - start,
        database: this.mongoConnection.name,
        collections: collections.map((collection) => collection.name).sort(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`MongoDB health check failed: ${message}`);
      return {
        status: 'down',
        state,
        latency: Date.now() - start,
        error: message,
      };
    }
  }

  private getMongoStateString(state: number): string {
    return MONGO_STATES[state] || 'unknown';
  }
}
