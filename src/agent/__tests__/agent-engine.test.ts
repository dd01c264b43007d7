/**
 * Unit tests for AgentEngine
 */

import axios, { AxiosInstance } from 'axios';
import { Registry } from 'prom-client';
import { AgentEngine, AgentEngineOptions } from '../agent-engine';
import { LoggerHierarchy, LogLevel } from '../../shared/utils/logger';
import { ConfigurationError, InvalidArgumentError } from '../../types';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

describe('AgentEngine', () => {
  let hierarchy: LoggerHierarchy;
  let options: AgentEngineOptions;

  beforeEach(() => {
    hierarchy = new LoggerHierarchy();
    hierarchy.setConsoleEnabled(false);
    options = {
      loggerHierarchy: hierarchy,
      metricsRegistry: new Registry(),
      diskUsageProbe: async () => ({ total: 500000000, free: 400000000 }),
      environment: { APP_MODE: 'test', SESSION_SECRET: 'test-secret' },
      startup: new Date('2024-05-01T08:00:00.000Z')
    };
  });

  it('should reject invalid configuration', () => {
    expect(() => new AgentEngine({ appName: '' }, options)).toThrow(ConfigurationError);
  });

  it('should list links for every enabled endpoint', () => {
    const engine = new AgentEngine({ appName: 'orders', disabledEndpoints: ['env', 'dump'] }, options);

    const { _links: links } = engine.getEndpoints('http://orders.test/actuator/');

    expect(links.self).toEqual({ href: 'http://orders.test/actuator', templated: false });
    expect(links.health).toEqual({ href: 'http://orders.test/actuator/health', templated: false });
    expect(links.env).toBeUndefined();
    expect(links.dump).toBeUndefined();
    expect(Object.keys(links)).toHaveLength(9);
  });

  it('should derive the management URL from the application URL', () => {
    const engine = new AgentEngine({ appName: 'orders', appUrl: 'http://orders.test/' }, options);

    expect(engine.getManagementUrl()).toBe('http://orders.test/actuator');
  });

  it('should report app info with additional entries', () => {
    const engine = new AgentEngine({
      appName: 'orders',
      appDescription: 'Order intake',
      additionalAppInfo: { build: { version: '2.1.0' } }
    }, options);

    expect(engine.getAppInfo()).toEqual({
      app: { name: 'orders', description: 'Order intake' },
      build: { version: '2.1.0' }
    });
  });

  it('should snapshot the configured environment with secrets masked', () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);

    expect(engine.getEnvironment().propertySources[0].properties).toEqual({
      APP_MODE: { value: 'test' },
      SESSION_SECRET: { value: '******' }
    });
  });

  it('should include the disk space indicator in health', async () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);
    engine.registerHealthIndicator('db', { getHealth: () => ({ status: 'UP', details: {} }) });

    const health = await engine.getHealth();

    expect(health.status).toBe('UP');
    expect(health.details.diskSpace).toEqual({
      status: 'UP',
      details: { total: 500000000, free: 400000000, threshold: 104857600 }
    });
  });

  it('should reject empty logger names', () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);

    expect(() => engine.setLoggerLevel('', 'DEBUG')).toThrow(InvalidArgumentError);
    expect(() => engine.getLogger('')).toThrow(InvalidArgumentError);
  });

  it('should apply the configured root level', () => {
    const engine = new AgentEngine({ appName: 'orders', logLevel: 'WARN' }, options);

    expect(engine.getLogger('ROOT')).toEqual({ configuredLevel: 'WARN', effectiveLevel: 'WARN' });
  });

  it('should leave the root level alone when none is configured', () => {
    hierarchy.setLevel('ROOT', LogLevel.DEBUG);

    const engine = new AgentEngine({ appName: 'orders' }, options);

    expect(engine.getLogger('ROOT')).toEqual({ configuredLevel: 'DEBUG', effectiveLevel: 'DEBUG' });
  });

  it('should capture log output only while started', async () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);
    const appLogger = hierarchy.getLogger('orders.http');

    appLogger.info('before start');
    engine.start();
    appLogger.info('while running');
    await engine.stop();
    appLogger.info('after stop');

    const { content } = engine.getLogRange();
    expect(content).not.toContain('before start');
    expect(content).toContain(' - orders.http - while running\n');
    expect(content).not.toContain('after stop');
  });

  it('should return traces it was given', () => {
    const engine = new AgentEngine({ appName: 'orders', traceCapacity: 1 }, options);
    const base = {
      timestamp: new Date(),
      principal: null,
      session: null,
      response: { status: 200, headers: {} },
      timeTaken: 3
    };
    engine.addTraceRecord({ ...base, request: { method: 'GET', uri: '/a', headers: {} } });
    engine.addTraceRecord({ ...base, request: { method: 'GET', uri: '/b', headers: {} } });

    expect(engine.getHttpTrace().traces.map(trace => trace.request.uri)).toEqual(['/b']);
  });

  it('should not create a registration client without a registry URL', () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);

    expect(engine.getRegistrationState()).toBeUndefined();
  });

  it('should expose a thread dump with the current thread', () => {
    const engine = new AgentEngine({ appName: 'orders' }, options);

    expect(engine.getThreadDump().threads[0].threadName).toBe('main');
  });

  describe('lifecycle with a registry', () => {
    const registryConfig = {
      appName: 'orders',
      appUrl: 'http://orders.test:8080',
      registrationUrl: 'http://registry.test/instances',
      registrationIntervalMs: 1000
    };
    let httpClient: { post: jest.Mock; delete: jest.Mock };

    beforeEach(() => {
      jest.useFakeTimers();
      httpClient = {
        post: jest.fn().mockResolvedValue({ status: 201, data: { id: 'instance-1' } }),
        delete: jest.fn().mockResolvedValue({ status: 204, data: '' })
      };
      mockedAxios.create.mockReturnValue(httpClient as unknown as AxiosInstance);
    });

    it('should return the same pending promise from repeated stops', async () => {
      let release: (value: unknown) => void = () => undefined;
      httpClient.post.mockReturnValueOnce(new Promise(resolve => {
        release = resolve;
      }));
      const engine = new AgentEngine(registryConfig, options);
      engine.start();
      await jest.advanceTimersByTimeAsync(0);

      const first = engine.stop();
      const second = engine.stop();
      let settled = false;
      void second.then(() => {
        settled = true;
      });
      await jest.advanceTimersByTimeAsync(0);

      expect(second).toBe(first);
      expect(settled).toBe(false);
      expect(httpClient.delete).not.toHaveBeenCalled();

      release({ status: 201, data: { id: 'instance-1' } });
      await first;

      expect(settled).toBe(true);
      expect(httpClient.delete).toHaveBeenCalledTimes(1);
      expect(engine.stop()).toBe(first);
    });

    it('should register again after a restart', async () => {
      const engine = new AgentEngine(registryConfig, options);
      engine.start();
      await jest.advanceTimersByTimeAsync(0);
      await engine.stop();

      engine.start();
      await jest.advanceTimersByTimeAsync(0);

      expect(httpClient.post).toHaveBeenCalledTimes(2);
      expect(engine.getRegistrationState()?.status).toBe('REGISTERED');

      await engine.stop();
      expect(httpClient.delete).toHaveBeenCalledTimes(2);
    });
  });
});
