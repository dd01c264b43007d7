/**
 * Point-in-time process metrics.
 *
 * Built-in metrics are computed from the running process on every call.
 * Application metrics registered in a prom-client registry are discovered
 * at call time and reported alongside them.
 */

import { MetricObjectWithValues, MetricValue, Registry } from 'prom-client';
import { InvalidArgumentError, Measurement, Metric, MetricNames, MetricNotFoundError } from '../../types';
import { ThreadRegistry } from './threads';

interface BuiltinMetric {
  description: string;
  baseUnit?: string;
  measure(): Measurement[];
}

interface CollectedValue {
  value: number;
  metricName?: string;
}

interface CollectedMetric {
  name: string;
  help: string;
  type: string;
  values: CollectedValue[];
}

function sumValues(values: CollectedValue[], suffix?: string): number {
  return values
    .filter(entry => suffix === undefined || (entry.metricName ?? '').endsWith(suffix))
    .reduce((total, entry) => total + entry.value, 0);
}

/**
 * prom-client types `type` as an enum but fills it with names such as `counter`.
 */
function normalizeCollected(metric: MetricObjectWithValues<MetricValue<string>>): CollectedMetric {
  return {
    name: metric.name,
    help: metric.help,
    type: String(metric.type),
    values: metric.values
  };
}

export function toMeasurements(collected: CollectedMetric): Measurement[] {
  switch (collected.type) {
    case 'counter':
      return [{ statistic: 'COUNT', value: sumValues(collected.values) }];
    case 'histogram':
    case 'summary':
      return [
        { statistic: 'COUNT', value: sumValues(collected.values, '_count') },
        { statistic: 'VALUE', value: sumValues(collected.values, '_sum') }
      ];
    default:
      return [{ statistic: 'VALUE', value: sumValues(collected.values) }];
  }
}

export class MetricsRegistry {
  private readonly builtins: Map<string, BuiltinMetric>;

  constructor(
    private readonly threads: ThreadRegistry,
    private readonly registry: Registry = new Registry()
  ) {
    this.builtins = new Map<string, BuiltinMetric>([
      ['memory.rss', {
        description: 'Resident set size of the process',
        baseUnit: 'bytes',
        measure: () => [{ statistic: 'VALUE', value: process.memoryUsage().rss }]
      }],
      ['memory.heap.used', {
        description: 'V8 heap in use',
        baseUnit: 'bytes',
        measure: () => [{ statistic: 'VALUE', value: process.memoryUsage().heapUsed }]
      }],
      ['memory.heap.total', {
        description: 'V8 heap allocated',
        baseUnit: 'bytes',
        measure: () => [{ statistic: 'VALUE', value: process.memoryUsage().heapTotal }]
      }],
      ['memory.external', {
        description: 'Memory of C++ objects bound to JavaScript objects',
        baseUnit: 'bytes',
        measure: () => [{ statistic: 'VALUE', value: process.memoryUsage().external }]
      }],
      ['process.uptime', {
        description: 'Time since the process started',
        baseUnit: 'seconds',
        measure: () => [{ statistic: 'VALUE', value: process.uptime() }]
      }],
      ['process.cpu.time', {
        description: 'User and system CPU time consumed by the process',
        baseUnit: 'seconds',
        measure: () => {
          const usage = process.cpuUsage();
          return [{ statistic: 'VALUE', value: (usage.user + usage.system) / 1e6 }];
        }
      }],
      ['thread.count', {
        description: 'Live threads: the current thread plus tracked workers',
        measure: () => [{ statistic: 'COUNT', value: this.threads.liveCount() }]
      }]
    ]);
  }

  getMetricNames(): MetricNames {
    const names = new Set<string>(this.builtins.keys());
    for (const metric of this.registry.getMetricsAsArray()) {
      names.add(metric.name);
    }
    return { names: [...names].sort() };
  }

  async getMetricMeasurement(name: string): Promise<Metric> {
    if (!name) {
      throw new InvalidArgumentError('Metric name must not be empty');
    }

    const builtin = this.builtins.get(name);
    if (builtin) {
      return {
        name,
        description: builtin.description,
        baseUnit: builtin.baseUnit,
        measurements: builtin.measure(),
        availableTags: []
      };
    }

    if (!this.registry.getSingleMetric(name)) {
      throw new MetricNotFoundError(name);
    }

    const collected = await this.registry.getMetricsAsJSON();
    const match = collected.map(normalizeCollected).find(metric => metric.name === name);
    if (!match) {
      throw new MetricNotFoundError(name);
    }

    return {
      name,
      description: match.help,
      measurements: toMeasurements(match),
      availableTags: []
    };
  }
}
