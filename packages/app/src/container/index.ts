/**
 * Manual dependency injection container implementation
 */

import type { Logger } from '@airwatch/logger';
import type {
  DependencyNode,
  HealthStatus,
  RegistrationOptions,
  Service,
  ServiceFactory,
  ServiceResolver,
} from './types.js';

type Registrations<TServices> = {
  [K in keyof TServices]?: {
    resolve: () => TServices[K];
    singleton: boolean;
    dependencies: Array<keyof TServices & string>;
  };
};

/**
 * Simple dependency injection container, typed by a service map
 *
 * Example:
 * ```typescript
 * const container = new Container<{ config: Config; cache: ViewCache }>();
 * container.register('config', () => config);
 * container.register('cache', (c) => new ViewCache({ logger }), { dependencies: ['config'] });
 * await container.initializeAll();
 * ```
 */
export class Container<TServices> implements ServiceResolver<TServices> {
  private registrations: Registrations<TServices> = {};
  private order: Array<keyof TServices & string> = [];
  private initialized = new Set<string>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Register a service factory. Services are singletons unless stated otherwise.
   */
  register<K extends keyof TServices & string>(
    token: K,
    factory: ServiceFactory<TServices, TServices[K]>,
    options: RegistrationOptions<TServices> = {}
  ): void {
    const singleton = options.singleton !== false;
    let instance: { value: TServices[K] } | undefined;

    this.registrations[token] = {
      resolve: () => {
        if (!singleton) {
          return factory(this);
        }
        if (instance === undefined) {
          instance = { value: factory(this) };
        }
        return instance.value;
      },
      singleton,
      dependencies: options.dependencies ?? [],
    };
    if (!this.order.includes(token)) {
      this.order.push(token);
    }
  }

  /**
   * Resolve a service instance
   */
  resolve<K extends keyof TServices & string>(token: K): TServices[K] {
    const registration = this.registrations[token];
    if (!registration) {
      throw new Error(`Service not registered: ${token}`);
    }
    return registration.resolve();
  }

  /**
   * Check if service is registered
   */
  has(token: keyof TServices & string): boolean {
    return this.registrations[token] !== undefined;
  }

  /**
   * Get dependency graph for visualization
   */
  getDependencyGraph(): DependencyNode[] {
    const buildNode = (token: keyof TServices & string, path: Set<string>): DependencyNode => {
      if (path.has(token)) {
        return { name: token, dependencies: [], metadata: { circular: true } };
      }
      const registration = this.registrations[token];
      const nextPath = new Set(path).add(token);

      return {
        name: token,
        dependencies: (registration?.dependencies ?? []).map((dep) => buildNode(dep, nextPath)),
        metadata: {
          singleton: registration?.singleton,
          initialized: this.initialized.has(token),
        },
      };
    };

    return this.order.map((token) => buildNode(token, new Set()));
  }

  /**
   * Initialize all registered services in dependency order
   */
  async initializeAll(): Promise<void> {
    const services = this.collectServices();

    const initialize = async (service: Service, path: Set<string>): Promise<void> => {
      if (this.initialized.has(service.name)) {
        return;
      }
      if (path.has(service.name)) {
        throw new Error(`Circular service dependency: ${[...path, service.name].join(' -> ')}`);
      }

      const nextPath = new Set(path).add(service.name);
      for (const depName of service.dependencies) {
        const dep = services.find((s) => s.name === depName);
        if (dep) {
          await initialize(dep, nextPath);
        }
      }

      await service.initialize();
      this.initialized.add(service.name);
    };

    for (const service of services) {
      await initialize(service, new Set());
    }
  }

  /**
   * Shutdown all initialized services, dependents first
   */
  async shutdownAll(): Promise<void> {
    const services = this.collectServices().filter((s) => this.initialized.has(s.name));

    const done = new Set<string>();
    const shutdownService = async (service: Service): Promise<void> => {
      if (done.has(service.name)) {
        return;
      }
      done.add(service.name);

      for (const dependent of services) {
        if (dependent.dependencies.includes(service.name)) {
          await shutdownService(dependent);
        }
      }

      // Keep going so the remaining services still shut down
      try {
        await service.shutdown();
      } catch (error) {
        this.logger?.error(`Error shutting down service ${service.name}`, { error });
      }
    };

    for (const service of services) {
      await shutdownService(service);
    }

    this.initialized.clear();
  }

  /**
   * Health check all initialized services
   */
  async healthCheckAll(): Promise<Map<string, HealthStatus>> {
    const results = new Map<string, HealthStatus>();

    for (const service of this.collectServices()) {
      if (!this.initialized.has(service.name)) {
        continue;
      }
      try {
        const status = service.healthCheck();
        results.set(service.name, { ...status, lastCheck: new Date() });
      } catch (error) {
        results.set(service.name, {
          healthy: false,
          message: `Health check failed: ${error}`,
          lastCheck: new Date(),
        });
      }
    }

    return results;
  }

  /**
   * Get wiring graph as ASCII art
   */
  getWiringGraph(): string {
    const lines: string[] = ['[App Container]'];

    const renderNode = (node: DependencyNode, prefix: string, isLast: boolean) => {
      const connector = isLast ? '└─> ' : '├─> ';
      const status = node.metadata?.['initialized'] === true ? '✓' : '○';
      lines.push(`${prefix}${connector}[${node.name}] ${status}`);

      const childPrefix = prefix + (isLast ? '      ' : '│     ');
      node.dependencies.forEach((dep, i) => {
        renderNode(dep, childPrefix, i === node.dependencies.length - 1);
      });
    };

    const nodes = this.getDependencyGraph();
    nodes.forEach((node, i) => {
      renderNode(node, '  ', i === nodes.length - 1);
    });

    return lines.join('\n');
  }

  private collectServices(): Service[] {
    const services: Service[] = [];
    for (const token of this.order) {
      const instance = this.resolve(token);
      if (isService(instance) && !services.includes(instance)) {
        services.push(instance);
      }
    }
    return services;
  }
}

/**
 * Type guard for Service interface
 */
export function isService(obj: unknown): obj is Service {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'name' in obj &&
    typeof obj.name === 'string' &&
    'dependencies' in obj &&
    Array.isArray(obj.dependencies) &&
    'initialize' in obj &&
    typeof obj.initialize === 'function' &&
    'shutdown' in obj &&
    typeof obj.shutdown === 'function' &&
    'healthCheck' in obj &&
    typeof obj.healthCheck === 'function'
  );
}

// Re-export types
export * from './types.js';
export * from './tokens.js';
