import type { PollingConfig, ServiceDefinition } from "../types/config.js";
import type { Service } from "../types/deployment.js";

/**
 * Build the ordered, frozen service list. Order is the polling order.
 */
export function buildRegistry(definitions: readonly ServiceDefinition[], polling: PollingConfig): readonly Service[] {
  const seen = new Set<string>();
  const services = definitions.map((def) => {
    if (seen.has(def.name)) throw new Error(`Duplicate service in registry: ${def.name}`);
    seen.add(def.name);
    return Object.freeze({
      name: def.name,
      healthProbe: Object.freeze([...(def.health_probe ?? ["ps", def.name])]),
      maxAttempts: def.max_attempts ?? polling.max_attempts,
      pollIntervalSeconds: def.poll_interval_seconds ?? polling.interval_seconds,
    });
  });
  return Object.freeze(services);
}

export function findService(registry: readonly Service[], name: string): Service | undefined {
  return registry.find((s) => s.name === name);
}
