/**
 * Health indicators and their aggregation into a single report
 */

import { statfs } from 'fs/promises';
import { logger } from '../../shared/utils/logger';
import { errorMessage, HealthDetail, HealthIndicator, HealthReport, HealthStatus, UnavailableError } from '../../types';

const healthLogger = logger.child('health');

export const DEFAULT_FREE_BYTES_THRESHOLD = 100 * 1024 * 1024;

export interface DiskUsage {
  total: number;
  free: number;
}

export type DiskUsageProbe = (path: string) => Promise<DiskUsage>;

export const statfsProbe: DiskUsageProbe = async (path: string) => {
  const stats = await statfs(path);
  return {
    total: stats.blocks * stats.bsize,
    free: stats.bavail * stats.bsize
  };
};

export function isHealthReport(detail: HealthDetail | undefined): detail is HealthReport {
  return typeof detail === 'object' && detail !== null && 'status' in detail && 'details' in detail;
}

/**
 * DOWN dominates at any depth; UP requires every status to be UP.
 */
export function foldStatuses(statuses: HealthStatus[]): HealthStatus {
  if (statuses.length === 0) {
    return 'UNKNOWN';
  }
  if (statuses.includes('DOWN')) {
    return 'DOWN';
  }
  if (statuses.every(status => status === 'UP')) {
    return 'UP';
  }
  if (statuses.includes('OUT_OF_SERVICE')) {
    return 'OUT_OF_SERVICE';
  }
  return 'UNKNOWN';
}

/**
 * Status of a report after taking its nested reports into account.
 */
export function resolveStatus(report: HealthReport): HealthStatus {
  const nested = Object.values(report.details).filter(isHealthReport).map(resolveStatus);
  if (nested.length === 0) {
    return report.status;
  }
  const folded = foldStatuses(nested);
  return folded === 'DOWN' ? 'DOWN' : foldStatuses([report.status, folded]);
}

export function healthHttpStatus(status: HealthStatus): number {
  return status === 'DOWN' || status === 'OUT_OF_SERVICE' ? 503 : 200;
}

export class HealthSummary implements HealthReport {
  constructor(
    readonly status: HealthStatus,
    readonly details: Record<string, HealthDetail>
  ) {}

  httpStatus(): number {
    return healthHttpStatus(this.status);
  }
}

export class DiskSpaceHealthIndicator implements HealthIndicator {
  constructor(
    private readonly path: string = '.',
    private readonly freeBytesThreshold: number = DEFAULT_FREE_BYTES_THRESHOLD,
    private readonly probe: DiskUsageProbe = statfsProbe
  ) {}

  async getHealth(): Promise<HealthReport> {
    const usage = await this.probe(this.path);
    return {
      status: usage.free < this.freeBytesThreshold ? 'DOWN' : 'UP',
      details: {
        total: usage.total,
        free: usage.free,
        threshold: this.freeBytesThreshold
      }
    };
  }
}

export class HealthAggregator {
  private indicators: Map<string, HealthIndicator> = new Map();

  register(name: string, indicator: HealthIndicator): void {
    this.indicators.set(name, indicator);
  }

  unregister(name: string): boolean {
    return this.indicators.delete(name);
  }

  names(): string[] {
    return [...this.indicators.keys()];
  }

  async getHealth(): Promise<HealthSummary> {
    const entries = [...this.indicators.entries()];
    const reports = await Promise.all(entries.map(([name, indicator]) => this.evaluate(name, indicator)));

    const details: Record<string, HealthDetail> = {};
    entries.forEach(([name], index) => {
      details[name] = reports[index];
    });

    return new HealthSummary(foldStatuses(reports.map(resolveStatus)), details);
  }

  private async evaluate(name: string, indicator: HealthIndicator): Promise<HealthReport> {
    try {
      return await indicator.getHealth();
    } catch (error) {
      const failure = new UnavailableError(errorMessage(error), { indicator: name });
      healthLogger.warn(`Health indicator ${name} failed: ${failure.message}`);
      return { status: 'DOWN', details: { error: failure.message, code: failure.code } };
    }
  }
}
