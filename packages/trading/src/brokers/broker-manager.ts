/**
 * Broker Manager
 * ==============
 * Selects a healthy execution venue: the primary broker first, then each
 * failover broker in order. The selected broker is cached until it fails a
 * later health check or a refresh is forced; concurrent callers share one
 * selection.
 */

import {
  BrokerUnavailableError,
  createLogger,
  getBrokerSettings,
  type BrokerSettings,
} from '@stratgate/utils';
import type { Broker, BrokerHealthStatus } from '../types.js';
import { createDefaultBrokerRegistry, type BrokerRegistry } from './broker-registry.js';

const logger = createLogger('trading:broker-manager');

export type BrokerManagerState = 'NO_BROKER' | 'SELECTING' | 'ACTIVE';

export interface BrokerHealthReport extends BrokerHealthStatus {
  name: string;
  isPrimary: boolean;
  isCurrent: boolean;
}

export interface BrokerManagerOptions {
  settings?: BrokerSettings;
  registry?: BrokerRegistry;
}

export class BrokerManager {
  private readonly settings: BrokerSettings;
  private readonly registry: BrokerRegistry;
  private readonly instances = new Map<string, Broker>();
  private current: Broker | undefined;
  private selecting: Promise<Broker> | undefined;

  constructor(options: BrokerManagerOptions = {}) {
    this.settings = options.settings ?? getBrokerSettings();
    this.registry = options.registry ?? createDefaultBrokerRegistry();
  }

  getState(): BrokerManagerState {
    if (this.selecting) return 'SELECTING';
    return this.current ? 'ACTIVE' : 'NO_BROKER';
  }

  getCurrentBrokerName(): string | undefined {
    return this.current?.name;
  }

  /**
   * Current healthy broker, selecting one if needed.
   * Throws BrokerUnavailableError when no candidate is healthy.
   */
  async getBroker(forceRefresh = false): Promise<Broker> {
    const cached = this.current;
    if (cached && !forceRefresh) {
      if (await this.isHealthy(cached)) {
        return cached;
      }
      logger.warn('Current broker became unhealthy', { broker: cached.name });
      if (this.current === cached) this.current = undefined;
    }
    if (!this.selecting) {
      this.selecting = this.select().finally(() => {
        this.selecting = undefined;
      });
    }
    return this.selecting;
  }

  /**
   * Instance for a specific broker name, created on first use
   */
  getBrokerByName(name: string): Broker {
    const key = name.toLowerCase();
    const cached = this.instances.get(key);
    if (cached) return cached;
    const broker = this.registry.create(key);
    this.instances.set(key, broker);
    return broker;
  }

  async getAllBrokerHealth(): Promise<BrokerHealthReport[]> {
    const primary = this.settings.primary.toLowerCase();
    const reports: BrokerHealthReport[] = [];
    for (const name of this.candidates()) {
      let status: BrokerHealthStatus;
      try {
        status = await this.getBrokerByName(name).getHealthStatus();
      } catch (error) {
        status = { healthy: false, error: error instanceof Error ? error.message : String(error) };
      }
      reports.push({
        ...status,
        name,
        isPrimary: name === primary,
        isCurrent: this.current?.name.toLowerCase() === name,
      });
    }
    return reports;
  }

  /**
   * Primary first, then the failover list when failover is enabled; duplicates removed
   */
  private candidates(): string[] {
    const names = [this.settings.primary];
    if (this.settings.failoverEnabled) {
      names.push(...this.settings.failoverList);
    }
    return Array.from(new Set(names.map((name) => name.toLowerCase()).filter((name) => name.length > 0)));
  }

  private async select(): Promise<Broker> {
    this.current = undefined;
    const attempted: string[] = [];

    for (const name of this.candidates()) {
      attempted.push(name);
      let broker: Broker;
      try {
        broker = this.getBrokerByName(name);
      } catch (error) {
        logger.warn('Could not create broker', {
          broker: name,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (await this.isHealthy(broker)) {
        this.current = broker;
        logger.info('Selected broker', { broker: name, failover: attempted.length > 1 });
        return broker;
      }
      logger.warn('Broker failed health check', { broker: name });
    }

    logger.error('No healthy broker available', undefined, { attempted });
    throw new BrokerUnavailableError(attempted);
  }

  /**
   * Health check bounded by the configured timeout; never throws
   */
  private async isHealthy(broker: Broker): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.settings.healthCheckTimeoutMs);
    });
    try {
      return await Promise.race([broker.healthCheck(), timeout]);
    } catch (error) {
      logger.warn('Health check threw', {
        broker: broker.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}

let defaultManager: BrokerManager | undefined;

/**
 * Process-wide manager built from environment settings
 */
export function getBrokerManager(): BrokerManager {
  if (!defaultManager) {
    defaultManager = new BrokerManager();
  }
  return defaultManager;
}
