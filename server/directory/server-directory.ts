/**
 * In-memory store of validated {@link ServerConfig} records, keyed by name.
 *
 * Shared by the capability registry and the server host: hosted servers register
 * themselves here and become discoverable like any remote server. No I/O happens here;
 * persistence is the registry's concern.
 */

import { logger } from '../observability/logger.js';
import type { Accessibility, Hosting, ServerConfig, TransportKind } from './server-config.js';

export interface DirectoryFilters {
  accessibility?: Accessibility;
  hosting?: Hosting;
  transport?: TransportKind;
}

export class ServerDirectory {
  private readonly configs = new Map<string, ServerConfig>();

  /**
   * Upsert. The last registration for a name wins.
   */
  register(config: ServerConfig): void {
    if (this.configs.has(config.name)) {
      logger.warn('Server already registered, overwriting configuration', { name: config.name });
    }
    this.configs.set(config.name, config);
    logger.info('Registered server', { name: config.name, transport: config.transport, hosting: config.hosting });
  }

  get(name: string): ServerConfig | undefined {
    return this.configs.get(name);
  }

  has(name: string): boolean {
    return this.configs.has(name);
  }

  /**
   * Entries matching every given filter, in registration order.
   */
  list(filters: DirectoryFilters = {}): ServerConfig[] {
    return [...this.configs.values()].filter(
      config =>
        (filters.accessibility === undefined || config.accessibility === filters.accessibility) &&
        (filters.hosting === undefined || config.hosting === filters.hosting) &&
        (filters.transport === undefined || config.transport === filters.transport),
    );
  }

  /**
   * @returns whether an entry was removed
   */
  remove(name: string): boolean {
    const removed = this.configs.delete(name);
    if (removed) {
      logger.info('Removed server', { name });
    }
    return removed;
  }

  clear(): void {
    this.configs.clear();
  }

  get size(): number {
    return this.configs.size;
  }
}
