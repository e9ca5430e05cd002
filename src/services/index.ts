/**
 * Service Supervision Module
 *
 * @example
 * ```typescript
 * const supervisor = createSupervisor(settings.services, { logger });
 * await supervisor.ensureRunning('qdrant');
 * ```
 */

import type { ServiceSettings } from '../config/settings.js';
import type { Logger } from '../utils/logger.js';
import { DockerComposeRuntime, resolveComposeFile } from './compose.js';
import { ServiceSupervisor } from './supervisor.js';
import { serviceDefinitions, type ContainerRuntime, type ServiceTransition } from './types.js';

export interface CreateSupervisorOptions {
  logger?: Logger;
  onTransition?: (transition: ServiceTransition) => void;
  /** Defaults to docker compose with the resolved compose file */
  runtime?: ContainerRuntime;
}

export function createSupervisor(
  settings: ServiceSettings,
  options: CreateSupervisorOptions = {}
): ServiceSupervisor {
  const runtime =
    options.runtime ??
    new DockerComposeRuntime({
      composeFile: resolveComposeFile(settings.composeFile),
      logger: options.logger,
    });

  return new ServiceSupervisor(serviceDefinitions(settings), runtime, {
    maxStartAttempts: settings.maxStartAttempts,
    startBackoffMs: settings.startBackoffMs,
    probeTimeoutMs: settings.probeTimeoutMs,
    logger: options.logger,
    onTransition: options.onTransition,
  });
}

export { ServiceSupervisor, type SupervisorOptions } from './supervisor.js';
export { DockerComposeRuntime, resolveComposeFile, PACKAGED_COMPOSE_FILE, type DockerComposeRuntimeOptions } from './compose.js';
export { httpHealthProbe } from './probe.js';
export {
  SERVICE_NAMES,
  HEALTH_PATHS,
  serviceDefinitions,
  type ContainerRuntime,
  type HealthProbe,
  type HealthResult,
  type ServiceDefinition,
  type ServiceName,
  type ServiceState,
  type ServiceStatus,
  type ServiceTransition,
} from './types.js';
