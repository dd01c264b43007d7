/**
 * Unit tests for ActuatorConfigManager
 */

import * as path from 'path';
import { ActuatorConfigManager } from '../config-manager';
import { ConfigurationError } from '../../../types';

const fixturePath = path.join(__dirname, '../../../../tests/fixtures/actuator.yaml');

describe('ActuatorConfigManager', () => {
  describe('validate', () => {
    it('should apply defaults', () => {
      expect(ActuatorConfigManager.validate({ appName: 'orders' })).toEqual({
        appName: 'orders',
        registrationIntervalMs: 10000,
        registrationTimeoutMs: 10000,
        metadata: {},
        additionalAppInfo: {},
        traceCapacity: 100,
        diskSpace: { path: '.', freeBytesThreshold: 104857600 },
        disabledEndpoints: [],
        logLevel: 'INFO'
      });
    });

    it('should report every problem at once', () => {
      let thrown: unknown;
      try {
        ActuatorConfigManager.validate({ traceCapacity: 0, disabledEndpoints: ['shutdown'] });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ConfigurationError);
      const problems = thrown instanceof ConfigurationError ? thrown.problems : [];
      expect(problems).toHaveLength(3);
      expect(problems).toContain('"appName" is required');
    });

    it('should require an application URL when registering', () => {
      expect(() => ActuatorConfigManager.validate({
        appName: 'orders',
        registrationUrl: 'http://registry.test/instances'
      })).toThrow('"appUrl" is required');
    });

    it('should reject unknown keys', () => {
      expect(() => ActuatorConfigManager.validate({ appName: 'orders', port: 8080 })).toThrow(ConfigurationError);
    });
  });

  describe('loadFromFile', () => {
    it('should parse and validate a YAML file', () => {
      const config = ActuatorConfigManager.loadFromFile(fixturePath);

      expect(config).toMatchObject({
        appName: 'billing-service',
        appUrl: 'http://billing.test:8080',
        registrationUrl: 'http://registry.test/instances',
        registrationIntervalMs: 2500,
        metadata: { team: 'payments' },
        diskSpace: { path: '/var/data', freeBytesThreshold: 104857600 },
        disabledEndpoints: ['env'],
        logLevel: 'DEBUG'
      });
    });

    it('should fail with a configuration error for a missing file', () => {
      expect(() => ActuatorConfigManager.loadFromFile('/nonexistent/actuator.yaml')).toThrow(ConfigurationError);
    });
  });

  describe('loadFromEnvironment', () => {
    it('should read ACTUATOR_ variables and convert numbers', () => {
      const config = ActuatorConfigManager.loadFromEnvironment({
        ACTUATOR_APP_NAME: 'inventory',
        ACTUATOR_APP_URL: 'http://inventory.test',
        ACTUATOR_REGISTRATION_URL: 'http://registry.test/instances',
        ACTUATOR_REGISTRATION_INTERVAL_MS: '3000',
        ACTUATOR_REGISTRATION_USERNAME: 'admin',
        ACTUATOR_REGISTRATION_PASSWORD: 'test-secret',
        ACTUATOR_METADATA_REGION: 'north',
        ACTUATOR_DISABLED_ENDPOINTS: 'env, logfile',
        ACTUATOR_DISK_FREE_THRESHOLD: '1024',
        UNRELATED: 'ignored'
      });

      expect(config).toMatchObject({
        appName: 'inventory',
        appUrl: 'http://inventory.test',
        registrationUrl: 'http://registry.test/instances',
        registrationIntervalMs: 3000,
        registrationAuth: { username: 'admin', password: 'test-secret' },
        metadata: { region: 'north' },
        disabledEndpoints: ['env', 'logfile'],
        diskSpace: { path: '.', freeBytesThreshold: 1024 }
      });
    });

    it('should fail without an application name', () => {
      expect(() => ActuatorConfigManager.loadFromEnvironment({})).toThrow('"appName" is required');
    });
  });
});
