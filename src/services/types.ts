/**
 * Service Supervision Types
 *
 * The supervisor owns the lifecycle of the containerized dependencies
 * (vector engine and parsing engine). It never talks to Docker directly:
 * a ContainerRuntime does.
 */

import type { ServiceSettings } from '../config/settings.js';

export type ServiceName = 'qdrant' | 'docling';

export const SERVICE_NAMES: readonly ServiceName[] = ['qdrant', 'docling'];

/**
 * Lifecycle states:
 *
 *   unknown -> probing -> healthy
 *                      -> starting -> probing -> ... (bounded) -> failed
 *
 * `stopped` after down().
 */
export type ServiceState = 'unknown' | 'probing' | 'starting' | 'healthy' | 'failed' | 'stopped';

export interface ServiceDefinition {
  name: ServiceName;
  /** Base URL of the service */
  url: string;
  /** GET path answering 2xx once the service is ready */
  healthPath: string;
}

export interface ServiceTransition {
  service: ServiceName;
  from: ServiceState;
  to: ServiceState;
  at: Date;
  reason?: string;
}

export interface ServiceStatus {
  name: ServiceName;
  url: string;
  state: ServiceState;
  reachable: boolean;
}

export type HealthResult = { ok: true } | { ok: false; reason: string };

export type HealthProbe = (url: string, timeoutMs: number) => Promise<HealthResult>;

/**
 * Capability interface over whatever starts containers.
 */
export interface ContainerRuntime {
  /** Start one service (returns once the runtime accepted the request) */
  up(service: ServiceName, signal?: AbortSignal): Promise<void>;
  /** Stop everything this runtime started */
  down(): Promise<void>;
}

export const HEALTH_PATHS: Readonly<Record<ServiceName, string>> = {
  qdrant: '/readyz',
  docling: '/health',
};

export function serviceDefinitions(settings: ServiceSettings): Record<ServiceName, ServiceDefinition> {
  return {
    qdrant: { name: 'qdrant', url: settings.qdrantUrl, healthPath: HEALTH_PATHS.qdrant },
    docling: { name: 'docling', url: settings.doclingUrl, healthPath: HEALTH_PATHS.docling },
  };
}
