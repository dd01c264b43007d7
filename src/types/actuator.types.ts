/**
 * Data model shared by the engine, its subcomponents and the adapters
 */

import { JsonValue } from './common.types';

export type HeaderMap = Record<string, string[]>;

export interface TraceRequest {
  method: string;
  uri: string;
  headers: HeaderMap;
}

export interface TraceResponse {
  status: number;
  headers: HeaderMap;
}

export interface TraceRecord {
  timestamp: Date;
  principal: null;
  session: null;
  request: TraceRequest;
  response: TraceResponse;
  timeTaken: number;
}

export interface HttpTrace {
  traces: TraceRecord[];
}

export interface LogChunk {
  content: string;
  length: number;
}

export interface LogfileSlice {
  content: Buffer;
  start: number;
  end: number;
}

export type Statistic = 'VALUE' | 'COUNT';

export interface Measurement {
  statistic: Statistic;
  value: number;
}

export interface Metric {
  name: string;
  description?: string;
  baseUnit?: string;
  measurements: Measurement[];
  availableTags: Array<{ tag: string; values: string[] }>;
}

export interface MetricNames {
  names: string[];
}

export const LEVEL_NAMES = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'OFF'] as const;

export type LevelName = typeof LEVEL_NAMES[number];

export interface LoggerConfig {
  configuredLevel: LevelName | null;
  effectiveLevel: LevelName;
}

export interface LoggersSnapshot {
  levels: LevelName[];
  loggers: Record<string, LoggerConfig>;
}

export type HealthStatus = 'UP' | 'DOWN' | 'UNKNOWN' | 'OUT_OF_SERVICE';

export type HealthDetail = HealthReport | string | number | boolean | null;

export interface HealthReport {
  status: HealthStatus;
  details: Record<string, HealthDetail>;
}

export interface HealthIndicator {
  getHealth(): HealthReport | Promise<HealthReport>;
}

export interface PropertyValue {
  value: string;
}

export interface PropertySource {
  name: string;
  properties: Record<string, PropertyValue>;
}

export interface EnvironmentReport {
  activeProfiles: string[];
  propertySources: PropertySource[];
}

export interface AppDescriptor {
  name: string;
  description?: string;
}

export interface AppInfo {
  app: AppDescriptor;
  [key: string]: JsonValue | AppDescriptor;
}

export interface StackTraceElement {
  methodName: string;
  fileName: string;
  lineNumber: number;
  className: string;
  nativeMethod: boolean;
}

export type ThreadState = 'NEW' | 'RUNNABLE' | 'TERMINATED';

export interface ThreadInfo {
  threadName: string;
  threadId: number;
  blockedTime: number;
  blockedCount: number;
  waitedTime: number;
  waitedCount: number;
  lockName: string | null;
  lockOwnerId: number;
  lockOwnerName: string | null;
  daemon: boolean;
  inNative: boolean;
  suspended: boolean;
  threadState: ThreadState;
  priority: number;
  stackTrace: StackTraceElement[];
  lockedMonitors: never[];
  lockedSynchronizers: never[];
  lockInfo: null;
}

export interface ThreadDump {
  threads: ThreadInfo[];
}

export const ENDPOINT_IDS = [
  'env',
  'info',
  'health',
  'metrics',
  'loggers',
  'dump',
  'threaddump',
  'logfile',
  'trace',
  'httptrace'
] as const;

export type EndpointId = typeof ENDPOINT_IDS[number];

export interface EndpointLink {
  href: string;
  templated: boolean;
}

export interface EndpointsReport {
  _links: Record<string, EndpointLink>;
}

export type RegistrationStatus = 'IDLE' | 'REGISTERING' | 'REGISTERED' | 'DEREGISTERING' | 'STOPPED';

export interface RegistrationState {
  status: RegistrationStatus;
  instanceId?: string;
  lastAttemptTime?: Date;
  lastSuccessTime?: Date;
  consecutiveFailures: number;
}

export interface RegistrationDocument {
  name: string;
  managementUrl: string;
  healthUrl: string;
  serviceUrl: string;
  metadata: Record<string, string>;
}
