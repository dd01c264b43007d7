/**
 * Periodic self-registration with a remote monitoring registry.
 *
 * The registry expires stale registrations, so the instance re-registers on
 * every tick. Failures never reach the host: they are counted, logged and
 * retried on the next tick.
 */

import axios, { AxiosInstance } from 'axios';
import { EventEmitter } from 'events';
import { logger } from '../../shared/utils/logger';
import {
  errorMessage,
  RegistrationDocument,
  RegistrationState,
  RegistrationStatus,
  RemoteRegistrationError
} from '../../types';

export const DEFAULT_REGISTRATION_INTERVAL_MS = 10000;
export const DEFAULT_REGISTRATION_TIMEOUT_MS = 10000;

export interface RegistrationAuth {
  username: string;
  password: string;
}

export interface RegistrationConfig {
  registrationUrl: string;
  name: string;
  serviceUrl: string;
  managementUrl: string;
  healthUrl?: string;
  metadata?: Record<string, string>;
  startup?: Date;
  intervalMs?: number;
  timeoutMs?: number;
  auth?: RegistrationAuth;
}

function readInstanceId(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'id' in data) {
    const { id } = data;
    if (typeof id === 'string' && id.length > 0) {
      return id;
    }
  }
  return undefined;
}

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export class RegistrationClient extends EventEmitter {
  private readonly httpClient: AxiosInstance;
  private readonly registrationLogger = logger.child('registration');
  private readonly document: RegistrationDocument;
  private readonly intervalMs: number;
  private state: RegistrationState = { status: 'IDLE', consecutiveFailures: 0 };
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private started: boolean = false;
  private stopRequested: boolean = false;
  private stopping?: Promise<void>;

  constructor(private readonly config: RegistrationConfig) {
    super();
    this.intervalMs = config.intervalMs ?? DEFAULT_REGISTRATION_INTERVAL_MS;

    const startup = (config.startup ?? new Date()).toISOString();
    this.document = Object.freeze({
      name: config.name,
      managementUrl: config.managementUrl,
      healthUrl: config.healthUrl ?? `${trimTrailingSlash(config.managementUrl)}/health`,
      serviceUrl: config.serviceUrl,
      metadata: Object.freeze({ ...config.metadata, startup })
    });

    this.httpClient = axios.create({
      timeout: config.timeoutMs ?? DEFAULT_REGISTRATION_TIMEOUT_MS,
      auth: config.auth,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'Actuator-Agent/1.0.0'
      }
    });
  }

  getState(): RegistrationState {
    return { ...this.state };
  }

  getRegistrationDocument(): RegistrationDocument {
    return this.document;
  }

  /**
   * Registers immediately, then once per interval until `stop()`.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.registrationLogger.info(
      `Starting registration of ${this.document.name} with ${this.config.registrationUrl} every ${this.intervalMs}ms`
    );
    this.schedule(0);
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopRequested = true;
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * One registration attempt. Resolves whether or not it succeeded.
   */
  async register(): Promise<void> {
    this.transition('REGISTERING');
    this.state.lastAttemptTime = new Date();

    try {
      const response = await this.httpClient.post(this.config.registrationUrl, this.document);
      const instanceId = readInstanceId(response.data);
      if (!instanceId) {
        throw new RemoteRegistrationError('Registry response carried no instance id', {
          status: response.status
        });
      }

      this.state.instanceId = instanceId;
      this.state.lastSuccessTime = new Date();
      this.state.consecutiveFailures = 0;
      this.transition('REGISTERED');
      this.registrationLogger.debug(`Registered as ${instanceId}`);
      this.emit('registered', instanceId);
    } catch (error) {
      this.state.consecutiveFailures++;
      this.transition('IDLE');
      const failure = this.toRegistrationError(error);
      this.registrationLogger.warn(
        `Registration with ${this.config.registrationUrl} failed (${this.state.consecutiveFailures} consecutive): ${failure.message}`
      );
      this.emit('registrationFailed', failure);
    }
  }

  private schedule(delayMs: number): void {
    if (this.stopRequested) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.register().finally(() => {
        this.inFlight = undefined;
        this.schedule(this.intervalMs);
      });
    }, delayMs);
    this.timer.unref();
  }

  private async shutdown(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    const { instanceId } = this.state;
    if (instanceId) {
      this.transition('DEREGISTERING');
      await this.deregister(instanceId);
    }

    this.transition('STOPPED');
    this.emit('stopped');
  }

  private async deregister(instanceId: string): Promise<void> {
    const url = `${trimTrailingSlash(this.config.registrationUrl)}/${encodeURIComponent(instanceId)}`;
    try {
      await this.httpClient.delete(url);
      this.registrationLogger.info(`Deregistered ${instanceId}`);
      this.emit('deregistered', instanceId);
    } catch (error) {
      this.registrationLogger.warn(`Deregistration of ${instanceId} failed: ${this.toRegistrationError(error).message}`);
    }
  }

  private transition(status: RegistrationStatus): void {
    this.state.status = status;
  }

  private toRegistrationError(error: unknown): RemoteRegistrationError {
    if (error instanceof RemoteRegistrationError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      return new RemoteRegistrationError(error.response
        ? `Registry responded with status ${error.response.status}`
        : `Registry unreachable: ${error.message}`, {
        status: error.response?.status ?? null
      });
    }
    return new RemoteRegistrationError(errorMessage(error));
  }
}
