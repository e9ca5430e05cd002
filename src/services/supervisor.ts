/**
 * Service Supervisor
 *
 * Brings a service to `healthy` on demand:
 *
 *   probe -> healthy? done
 *         -> up + backoff + probe, at most maxStartAttempts times
 *         -> ServiceStartFailedError
 *
 * Concurrent callers for the same service share one in-flight start. The
 * start runs under its own signal; a caller's signal only withdraws that
 * caller, and the start is abandoned once every caller has withdrawn.
 */

import { OperationCancelledError, ServiceStartFailedError } from '../errors/index.js';
import { sleep as defaultSleep, throwIfAborted } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import { httpHealthProbe } from './probe.js';
import type {
  ContainerRuntime,
  HealthProbe,
  ServiceDefinition,
  ServiceName,
  ServiceState,
  ServiceStatus,
  ServiceTransition,
} from './types.js';

export interface SupervisorOptions {
  maxStartAttempts: number;
  startBackoffMs: number;
  probeTimeoutMs: number;
  logger?: Logger;
  onTransition?: (transition: ServiceTransition) => void;
  /** @internal Inject for testing */
  probe?: HealthProbe;
  /** @internal Inject for testing */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface InFlightStart {
  promise: Promise<'healthy'>;
  controller: AbortController;
  /** Callers still waiting; one without a signal never leaves */
  waiters: number;
}

export class ServiceSupervisor {
  private readonly states = new Map<ServiceName, ServiceState>();
  private readonly history = new Map<ServiceName, ServiceTransition[]>();
  private readonly inFlight = new Map<ServiceName, InFlightStart>();
  private readonly probe: HealthProbe;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly services: Readonly<Record<ServiceName, ServiceDefinition>>,
    private readonly runtime: ContainerRuntime,
    private readonly options: SupervisorOptions
  ) {
    this.probe = options.probe ?? httpHealthProbe;
    this.sleep = options.sleep ?? defaultSleep;
  }

  state(service: ServiceName): ServiceState {
    return this.states.get(service) ?? 'unknown';
  }

  transitions(service: ServiceName): readonly ServiceTransition[] {
    return this.history.get(service) ?? [];
  }

  /**
   * Resolve once the service is healthy, starting it if needed.
   *
   * @throws ServiceStartFailedError when the start budget is exhausted
   * @throws OperationCancelledError when the signal aborts
   */
  ensureRunning(service: ServiceName, signal?: AbortSignal): Promise<'healthy'> {
    if (this.state(service) === 'healthy') {
      return Promise.resolve('healthy');
    }
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError(`Starting ${service}`));
    }

    let entry = this.inFlight.get(service);
    if (!entry) {
      const controller = new AbortController();
      const started: InFlightStart = {
        controller,
        waiters: 0,
        promise: this.start(service, controller.signal).finally(() => this.forget(service, started)),
      };
      this.inFlight.set(service, started);
      entry = started;
    }

    return this.join(service, entry, signal);
  }

  /**
   * Probe every service without starting anything.
   */
  async status(): Promise<ServiceStatus[]> {
    const entries = Object.values(this.services);
    return Promise.all(
      entries.map(async (definition) => {
        const result = await this.probe(this.healthUrl(definition), this.options.probeTimeoutMs);
        return {
          name: definition.name,
          url: definition.url,
          state: this.state(definition.name),
          reachable: result.ok,
        };
      })
    );
  }

  /**
   * Stop all services through the runtime.
   */
  async down(): Promise<void> {
    await this.runtime.down();
    for (const definition of Object.values(this.services)) {
      this.transition(definition.name, 'stopped');
    }
  }

  private async start(service: ServiceName, signal?: AbortSignal): Promise<'healthy'> {
    const definition = this.services[service];
    const url = this.healthUrl(definition);
    const { maxStartAttempts, startBackoffMs, probeTimeoutMs } = this.options;

    this.transition(service, 'probing');
    const initial = await this.probe(url, probeTimeoutMs);
    if (initial.ok) {
      this.transition(service, 'healthy');
      return 'healthy';
    }

    let lastReason = initial.reason;

    for (let attempt = 1; attempt <= maxStartAttempts; attempt++) {
      throwIfAborted(signal, `Starting ${service}`);
      this.transition(service, 'starting', `attempt ${attempt}/${maxStartAttempts}`);

      try {
        await this.runtime.up(service, signal);
      } catch (error) {
        if (error instanceof OperationCancelledError || signal?.aborted) {
          throw new OperationCancelledError(`Starting ${service}`);
        }
        lastReason = error instanceof Error ? error.message : String(error);
        this.options.logger?.debug?.(`Starting ${service} (attempt ${attempt}) failed: ${lastReason}`);
        if (attempt < maxStartAttempts) {
          await this.sleep(startBackoffMs * Math.pow(2, attempt - 1), signal);
        }
        continue;
      }

      await this.sleep(startBackoffMs * Math.pow(2, attempt - 1), signal);

      this.transition(service, 'probing');
      const result = await this.probe(url, probeTimeoutMs);
      if (result.ok) {
        this.transition(service, 'healthy');
        return 'healthy';
      }
      lastReason = result.reason;
    }

    this.transition(service, 'failed', lastReason);
    throw new ServiceStartFailedError(service, maxStartAttempts, lastReason);
  }

  private join(service: ServiceName, entry: InFlightStart, signal?: AbortSignal): Promise<'healthy'> {
    entry.waiters++;
    if (!signal) {
      return entry.promise;
    }

    return new Promise<'healthy'>((resolve, reject) => {
      const onAbort = (): void => {
        entry.waiters--;
        if (entry.waiters === 0) {
          this.forget(service, entry);
          entry.controller.abort();
        }
        reject(new OperationCancelledError(`Starting ${service}`));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      entry.promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private forget(service: ServiceName, entry: InFlightStart): void {
    if (this.inFlight.get(service) === entry) {
      this.inFlight.delete(service);
    }
  }

  private healthUrl(definition: ServiceDefinition): string {
    return definition.url.replace(/\/+$/, '') + definition.healthPath;
  }

  private transition(service: ServiceName, to: ServiceState, reason?: string): void {
    const from = this.state(service);
    const entry: ServiceTransition = { service, from, to, at: new Date(), reason };

    this.states.set(service, to);
    const list = this.history.get(service) ?? [];
    list.push(entry);
    this.history.set(service, list);

    this.options.onTransition?.(entry);
  }
}
