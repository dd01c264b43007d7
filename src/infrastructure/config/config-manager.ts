import * as fs from 'fs';
import * as yaml from 'js-yaml';
import Joi from 'joi';
import { ConfigurationError, ENDPOINT_IDS, EndpointId, JsonValue, LEVEL_NAMES, LevelName } from '../../types';

export interface DiskSpaceConfig {
  path: string;
  freeBytesThreshold: number;
}

export interface RegistrationAuthConfig {
  username: string;
  password: string;
}

export interface ActuatorConfig {
  appName: string;
  appDescription?: string;
  appUrl?: string;
  managementUrl?: string;
  registrationUrl?: string;
  registrationIntervalMs: number;
  registrationTimeoutMs: number;
  registrationAuth?: RegistrationAuthConfig;
  metadata: Record<string, string>;
  additionalAppInfo: Record<string, JsonValue>;
  traceCapacity: number;
  diskSpace: DiskSpaceConfig;
  disabledEndpoints: EndpointId[];
  logLevel: LevelName;
}

export type ActuatorConfigInput = Partial<ActuatorConfig> & Pick<ActuatorConfig, 'appName'>;

const configSchema = Joi.object<ActuatorConfig>({
  appName: Joi.string().min(1).required(),
  appDescription: Joi.string().optional(),
  appUrl: Joi.string().uri({ scheme: ['http', 'https'] }).when('registrationUrl', {
    is: Joi.exist(),
    then: Joi.required()
  }),
  managementUrl: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  registrationUrl: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  registrationIntervalMs: Joi.number().integer().min(1).default(10000),
  registrationTimeoutMs: Joi.number().integer().min(1).default(10000),
  registrationAuth: Joi.object({
    username: Joi.string().required(),
    password: Joi.string().allow('').required()
  }).optional(),
  metadata: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  additionalAppInfo: Joi.object().unknown(true).default({}),
  traceCapacity: Joi.number().integer().min(1).default(100),
  diskSpace: Joi.object({
    path: Joi.string().default('.'),
    freeBytesThreshold: Joi.number().integer().min(0).default(100 * 1024 * 1024)
  }).default(),
  disabledEndpoints: Joi.array().items(Joi.string().valid(...ENDPOINT_IDS)).unique().default([]),
  logLevel: Joi.string().valid(...LEVEL_NAMES).insensitive().default('INFO')
});

export class ActuatorConfigManager {
  /**
   * Validates and applies defaults. Every problem is reported, not only the first.
   */
  static validate(input: unknown): ActuatorConfig {
    const { error, value } = configSchema.validate(input, {
      abortEarly: false,
      allowUnknown: false,
      convert: true
    });

    if (error) {
      throw new ConfigurationError(error.details.map(detail => detail.message));
    }
    return value;
  }

  static loadFromFile(filePath: string): ActuatorConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError([`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
    }
    return ActuatorConfigManager.validate(parsed ?? {});
  }

  /**
   * Reads `ACTUATOR_*` variables. Metadata comes from `ACTUATOR_METADATA_<KEY>`.
   */
  static loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): ActuatorConfig {
    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (key.startsWith('ACTUATOR_METADATA_') && value !== undefined) {
        metadata[key.slice('ACTUATOR_METADATA_'.length).toLowerCase()] = value;
      }
    }

    const candidate: Record<string, unknown> = {
      appName: env.ACTUATOR_APP_NAME,
      appDescription: env.ACTUATOR_APP_DESCRIPTION,
      appUrl: env.ACTUATOR_APP_URL,
      managementUrl: env.ACTUATOR_MANAGEMENT_URL,
      registrationUrl: env.ACTUATOR_REGISTRATION_URL,
      registrationIntervalMs: env.ACTUATOR_REGISTRATION_INTERVAL_MS,
      registrationTimeoutMs: env.ACTUATOR_REGISTRATION_TIMEOUT_MS,
      traceCapacity: env.ACTUATOR_TRACE_CAPACITY,
      logLevel: env.ACTUATOR_LOG_LEVEL,
      metadata,
      disabledEndpoints: env.ACTUATOR_DISABLED_ENDPOINTS
        ?.split(',')
        .map(endpoint => endpoint.trim())
        .filter(endpoint => endpoint.length > 0)
    };

    if (env.ACTUATOR_REGISTRATION_USERNAME !== undefined) {
      candidate.registrationAuth = {
        username: env.ACTUATOR_REGISTRATION_USERNAME,
        password: env.ACTUATOR_REGISTRATION_PASSWORD ?? ''
      };
    }

    if (env.ACTUATOR_DISK_PATH !== undefined || env.ACTUATOR_DISK_FREE_THRESHOLD !== undefined) {
      candidate.diskSpace = {
        path: env.ACTUATOR_DISK_PATH,
        freeBytesThreshold: env.ACTUATOR_DISK_FREE_THRESHOLD
      };
    }

    const defined = Object.fromEntries(Object.entries(candidate).filter(([, value]) => value !== undefined));
    return ActuatorConfigManager.validate(defined);
  }
}
