/**
 * Core types for dependency injection container
 */

/**
 * Base service interface for anything with a lifecycle
 */
export interface Service {
  readonly name: string;
  /** Names of services that must initialize first */
  readonly dependencies: string[];
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  healthCheck(): HealthStatus;
}

/**
 * Health status for service health checks
 */
export interface HealthStatus {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: Date;
}

/**
 * Dependency node for visualization
 */
export interface DependencyNode {
  name: string;
  dependencies: DependencyNode[];
  metadata?: Record<string, unknown>;
}

/**
 * Service factory function type
 */
export type ServiceFactory<TServices, T> = (container: ServiceResolver<TServices>) => T;

/**
 * Read side of the container, handed to factories
 */
export interface ServiceResolver<TServices> {
  resolve<K extends keyof TServices & string>(token: K): TServices[K];
  has(token: keyof TServices & string): boolean;
}

/**
 * Service registration metadata
 */
export interface RegistrationOptions<TServices> {
  singleton?: boolean;
  /** Tokens this service resolves; used for the dependency graph only */
  dependencies?: Array<keyof TServices & string>;
}
