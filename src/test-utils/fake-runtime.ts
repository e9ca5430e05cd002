/**
 * Container runtime and health probe stand-ins for supervisor tests.
 *
 * `up(service)` marks the service as running; the probe reports running
 * services as healthy. Failures are scripted per call.
 */

import type { ContainerRuntime, HealthProbe, ServiceName } from '../services/types.js';

export class FakeContainerRuntime implements ContainerRuntime {
  readonly running = new Set<ServiceName>();
  readonly upCalls: ServiceName[] = [];
  downCalls = 0;
  /** Number of upcoming up() calls that throw */
  failNextUps = 0;
  /** When false, up() succeeds but the service never becomes healthy */
  startsHealthy = true;

  async up(service: ServiceName): Promise<void> {
    this.upCalls.push(service);
    if (this.failNextUps > 0) {
      this.failNextUps--;
      throw new Error('docker compose up -d failed: Cannot connect to the Docker daemon');
    }
    if (this.startsHealthy) {
      this.running.add(service);
    }
  }

  async down(): Promise<void> {
    this.downCalls++;
    this.running.clear();
  }

  /** Probe that reports a service healthy while the runtime has it running */
  probeFor(urls: Record<string, ServiceName>): HealthProbe {
    return async (url) => {
      const service = urls[url];
      return service !== undefined && this.running.has(service)
        ? { ok: true }
        : { ok: false, reason: 'connection refused' };
    };
  }
}
