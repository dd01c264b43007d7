/**
 * Composition root of the actuator agent.
 *
 * One engine is constructed by the host and handed to each adapter. The
 * engine owns all observable state and the registration timer; adapters
 * only translate requests into these method calls.
 */

import { Registry } from 'prom-client';
import { ActuatorConfig, ActuatorConfigInput, ActuatorConfigManager } from '../infrastructure/config';
import { getEnvironmentReport } from '../infrastructure/monitoring/environment';
import { DiskSpaceHealthIndicator, DiskUsageProbe, HealthAggregator, HealthSummary } from '../infrastructure/monitoring/health';
import { LogCapture } from '../infrastructure/monitoring/log-capture';
import { LoggerRegistry } from '../infrastructure/monitoring/logger-registry';
import { MetricsRegistry } from '../infrastructure/monitoring/metrics';
import { ThreadRegistry, TrackableWorker } from '../infrastructure/monitoring/threads';
import { TraceRecorder } from '../infrastructure/monitoring/trace-recorder';
import { RegistrationClient } from '../integration/registry';
import { Logger, loggerHierarchy as sharedHierarchy, LoggerHierarchy, parseLevel } from '../shared/utils/logger';
import {
  AppInfo,
  ENDPOINT_IDS,
  EndpointId,
  EndpointsReport,
  EnvironmentReport,
  HealthIndicator,
  HttpTrace,
  InvalidArgumentError,
  LogChunk,
  LogfileSlice,
  LoggerConfig,
  LoggersSnapshot,
  Metric,
  MetricNames,
  RegistrationState,
  ThreadDump,
  TraceRecord
} from '../types';

export const ACTUATOR_CONTENT_TYPE = 'application/vnd.spring-boot.actuator.v2+json';

export interface AgentEngineOptions {
  loggerHierarchy?: LoggerHierarchy;
  metricsRegistry?: Registry;
  diskUsageProbe?: DiskUsageProbe;
  environment?: NodeJS.ProcessEnv;
  startup?: Date;
}

export class AgentEngine {
  readonly config: ActuatorConfig;
  readonly startup: Date;

  private readonly hierarchy: LoggerHierarchy;
  private readonly logger: Logger;
  private readonly environment: NodeJS.ProcessEnv;
  private readonly traces: TraceRecorder;
  private readonly logCapture: LogCapture;
  private readonly metrics: MetricsRegistry;
  private readonly loggers: LoggerRegistry;
  private readonly health: HealthAggregator;
  private readonly threads: ThreadRegistry;
  private registration?: RegistrationClient;
  private readonly disabled: Set<EndpointId>;
  private running: boolean = false;
  private stopped: boolean = false;
  private stopping?: Promise<void>;

  constructor(config: ActuatorConfigInput, options: AgentEngineOptions = {}) {
    this.config = ActuatorConfigManager.validate(config);
    this.startup = options.startup ?? new Date();
    this.hierarchy = options.loggerHierarchy ?? sharedHierarchy;
    this.logger = this.hierarchy.getLogger('actuator.engine');
    this.environment = options.environment ?? process.env;
    this.disabled = new Set(this.config.disabledEndpoints);

    // ROOT is only touched when the caller asked for a level
    if (config.logLevel !== undefined) {
      this.hierarchy.setLevel('ROOT', parseLevel(this.config.logLevel));
    }

    this.traces = new TraceRecorder(this.config.traceCapacity);
    this.logCapture = new LogCapture();
    this.threads = new ThreadRegistry();
    this.metrics = new MetricsRegistry(this.threads, options.metricsRegistry);
    this.loggers = new LoggerRegistry(this.hierarchy);
    this.health = new HealthAggregator();
    this.health.register('diskSpace', new DiskSpaceHealthIndicator(
      this.config.diskSpace.path,
      this.config.diskSpace.freeBytesThreshold,
      options.diskUsageProbe
    ));

    this.registration = this.createRegistrationClient();
  }

  /**
   * Begins capturing log output and, when a registry is configured, the
   * periodic registration. An engine can be started again once `stop()` has
   * resolved; registration then starts over with a fresh client.
   */
  start(): void {
    if (this.running) {
      return;
    }
    if (this.stopped) {
      this.registration = this.createRegistrationClient();
      this.stopped = false;
      this.stopping = undefined;
    }
    this.running = true;
    this.hierarchy.addSink(this.logCapture);
    this.registration?.start();
    this.logger.info(`Actuator agent started for ${this.config.appName}`);
  }

  /**
   * Every call made while stopping, or after, returns the same promise.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      if (!this.running) {
        return Promise.resolve();
      }
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  isEndpointEnabled(endpoint: EndpointId): boolean {
    return !this.disabled.has(endpoint);
  }

  getManagementUrl(): string {
    if (this.config.managementUrl) {
      return this.config.managementUrl;
    }
    return this.config.appUrl ? `${this.config.appUrl.replace(/\/$/, '')}/actuator` : '/actuator';
  }

  getEndpoints(baseUrl: string = this.getManagementUrl()): EndpointsReport {
    const base = baseUrl.replace(/\/$/, '');
    const links: EndpointsReport['_links'] = {
      self: { href: base, templated: false }
    };
    for (const endpoint of ENDPOINT_IDS) {
      if (this.isEndpointEnabled(endpoint)) {
        links[endpoint] = { href: `${base}/${endpoint}`, templated: false };
      }
    }
    return { _links: links };
  }

  getEnvironment(): EnvironmentReport {
    return getEnvironmentReport(this.environment);
  }

  getAppInfo(): AppInfo {
    return {
      ...this.config.additionalAppInfo,
      app: {
        name: this.config.appName,
        ...(this.config.appDescription ? { description: this.config.appDescription } : {})
      }
    };
  }

  getHealth(): Promise<HealthSummary> {
    return this.health.getHealth();
  }

  registerHealthIndicator(name: string, indicator: HealthIndicator): void {
    if (!name) {
      throw new InvalidArgumentError('Health indicator name must not be empty');
    }
    this.health.register(name, indicator);
  }

  unregisterHealthIndicator(name: string): boolean {
    return this.health.unregister(name);
  }

  getMetricNames(): MetricNames {
    return this.metrics.getMetricNames();
  }

  getMetricMeasurement(name: string): Promise<Metric> {
    return this.metrics.getMetricMeasurement(name);
  }

  getLoggers(): LoggersSnapshot {
    return this.loggers.getLoggers();
  }

  getLogger(name: string): LoggerConfig {
    if (!name) {
      throw new InvalidArgumentError('Logger name must not be empty');
    }
    return this.loggers.getLogger(name);
  }

  setLoggerLevel(name: string, level: string | null): void {
    if (!name) {
      throw new InvalidArgumentError('Logger name must not be empty');
    }
    this.loggers.setLoggerLevel(name, level);
    this.logger.info(`Logger ${name} level set to ${level ?? 'inherited'}`);
  }

  getLogRange(): LogChunk {
    return this.logCapture.getRange();
  }

  getLogfile(rangeHeader: string): LogfileSlice {
    return this.logCapture.getLogfile(rangeHeader);
  }

  resetLogfile(): void {
    this.logCapture.reset();
  }

  addTraceRecord(record: TraceRecord): void {
    this.traces.addRecord(record);
  }

  getHttpTrace(): HttpTrace {
    return this.traces.getHttpTrace();
  }

  trackWorker(worker: TrackableWorker, name?: string): void {
    this.threads.track(worker, name);
  }

  getThreadDump(): ThreadDump {
    return this.threads.getThreadDump();
  }

  getRegistrationState(): RegistrationState | undefined {
    return this.registration?.getState();
  }

  private async shutdown(): Promise<void> {
    try {
      await this.registration?.stop();
      this.logger.info(`Actuator agent stopped for ${this.config.appName}`);
    } finally {
      this.hierarchy.removeSink(this.logCapture);
      this.running = false;
      this.stopped = true;
    }
  }

  private createRegistrationClient(): RegistrationClient | undefined {
    if (!this.config.registrationUrl || !this.config.appUrl) {
      return undefined;
    }
    return new RegistrationClient({
      registrationUrl: this.config.registrationUrl,
      name: this.config.appName,
      serviceUrl: this.config.appUrl,
      managementUrl: this.getManagementUrl(),
      metadata: this.config.metadata,
      startup: this.startup,
      intervalMs: this.config.registrationIntervalMs,
      timeoutMs: this.config.registrationTimeoutMs,
      auth: this.config.registrationAuth
    });
  }
}
