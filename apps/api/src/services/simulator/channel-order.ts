import type { ChannelDefinition } from '@agri-telemetry/domain';
import { ConfigurationError } from '../../errors.js';
import { directionOf } from './threshold-monitor.js';

function dependenciesOf(definition: ChannelDefinition): string[] {
  const deps = new Set(definition.dependsOn ?? []);
  if (definition.profile.kind === 'exponential') deps.add(definition.profile.driver);
  return [...deps];
}

export function validateChannel(definition: ChannelDefinition): void {
  const { name, minValue, maxValue, warningThreshold, criticalThreshold, seedValue } = definition;

  if (minValue !== undefined && maxValue !== undefined && minValue > maxValue) {
    throw new ConfigurationError(`${name}: min_value ${minValue} exceeds max_value ${maxValue}`);
  }
  if ((minValue !== undefined && seedValue < minValue) || (maxValue !== undefined && seedValue > maxValue)) {
    throw new ConfigurationError(`${name}: seed value ${seedValue} is outside its bounds`);
  }
  if (warningThreshold !== undefined && criticalThreshold !== undefined) {
    const direction = directionOf(definition);
    if (direction === 'high' && warningThreshold > criticalThreshold) {
      throw new ConfigurationError(`${name}: warning threshold must not exceed critical threshold`);
    }
    if (direction === 'low' && warningThreshold < criticalThreshold) {
      throw new ConfigurationError(`${name}: warning threshold must not be below critical threshold`);
    }
  }
}

/**
 * Orders channels so every channel comes after the channels it depends on
 * (declared `dependsOn` plus the driver of an exponential profile).
 * Independent channels keep their catalog order.
 */
export function orderChannels(definitions: readonly ChannelDefinition[]): ChannelDefinition[] {
  const byName = new Map<string, ChannelDefinition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      throw new ConfigurationError(`duplicate channel: ${definition.name}`);
    }
    byName.set(definition.name, definition);
  }

  const pending = new Map<string, string[]>();
  for (const definition of definitions) {
    const deps = dependenciesOf(definition);
    for (const dep of deps) {
      if (!byName.has(dep)) {
        throw new ConfigurationError(`${definition.name} depends on unknown channel ${dep}`);
      }
    }
    pending.set(definition.name, deps);
  }

  const ordered: ChannelDefinition[] = [];
  const placed = new Set<string>();
  while (ordered.length < definitions.length) {
    const ready = definitions.find(
      (d) => !placed.has(d.name) && (pending.get(d.name) ?? []).every((dep) => placed.has(dep)),
    );
    if (!ready) {
      const stuck = definitions.filter((d) => !placed.has(d.name)).map((d) => d.name);
      throw new ConfigurationError(`circular channel dependencies: ${stuck.join(', ')}`);
    }
    ordered.push(ready);
    placed.add(ready.name);
  }
  return ordered;
}
