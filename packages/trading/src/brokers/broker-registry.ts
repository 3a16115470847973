/**
 * Broker Registry
 *
 * Maps broker names to factories. Names are case-insensitive.
 */

import { ConfigurationError } from '@stratgate/utils';
import type { Broker } from '../types.js';
import { AlpacaBroker } from './alpaca-broker.js';
import { PaperBroker } from './paper-broker.js';

export type BrokerFactory = () => Broker;

export class BrokerRegistry {
  private readonly factories = new Map<string, BrokerFactory>();

  register(name: string, factory: BrokerFactory): this {
    this.factories.set(name.toLowerCase(), factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.toLowerCase());
  }

  /**
   * Build a new broker instance; unknown names are a configuration error
   */
  create(name: string): Broker {
    const factory = this.factories.get(name.toLowerCase());
    if (!factory) {
      throw new ConfigurationError(`Unknown broker: ${name}`, 'BROKER_PRIMARY', {
        known: this.names(),
      });
    }
    return factory();
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }
}

export function createDefaultBrokerRegistry(): BrokerRegistry {
  return new BrokerRegistry()
    .register('alpaca', () => new AlpacaBroker())
    .register('paper', () => new PaperBroker());
}
