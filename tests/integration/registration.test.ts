/**
 * Registration against a live in-process registry server
 */

import { Registry } from 'prom-client';
import { AgentEngine } from '../../src/agent';
import { RegistrationClient } from '../../src/integration/registry';
import { LoggerHierarchy } from '../../src/shared/utils/logger';
import { RemoteRegistrationError } from '../../src/types';
import { MockRegistryService } from './mock-services/mock-registry-service';

async function waitFor(condition: () => boolean, timeoutMs: number = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

describe('Registration integration', () => {
  let registry: MockRegistryService;
  let registrationUrl: string;

  beforeEach(async () => {
    registry = new MockRegistryService();
    registrationUrl = await registry.start();
  });

  afterEach(async () => {
    await registry.stop();
  });

  it('should keep re-registering until stopped and then deregister once', async () => {
    const engine = new AgentEngine({
      appName: 'orders',
      appUrl: 'http://orders.test:8080',
      registrationUrl,
      registrationIntervalMs: 50,
      metadata: { team: 'fulfilment' }
    }, {
      loggerHierarchy: new LoggerHierarchy(),
      metricsRegistry: new Registry(),
      startup: new Date('2024-05-01T08:00:00.000Z')
    });

    engine.start();
    await waitFor(() => registry.registrations.length >= 4);
    await engine.stop();
    const registeredBeforeStop = registry.registrations.length;

    expect(registry.registrations[0]).toEqual({
      name: 'orders',
      managementUrl: 'http://orders.test:8080/actuator',
      healthUrl: 'http://orders.test:8080/actuator/health',
      serviceUrl: 'http://orders.test:8080',
      metadata: { team: 'fulfilment', startup: '2024-05-01T08:00:00.000Z' }
    });
    const startups = new Set(registry.registrations.map(registration => registration.metadata.startup));
    expect(startups).toEqual(new Set(['2024-05-01T08:00:00.000Z']));
    expect(registry.deregistrations).toEqual(['instance-1']);
    expect(engine.getRegistrationState()?.status).toBe('STOPPED');

    await new Promise(resolve => setTimeout(resolve, 150));
    expect(registry.registrations).toHaveLength(registeredBeforeStop);
  });

  it('should recover after the registry starts accepting again', async () => {
    const client = new RegistrationClient({
      registrationUrl,
      name: 'orders',
      serviceUrl: 'http://orders.test:8080',
      managementUrl: 'http://orders.test:8080/actuator',
      intervalMs: 30
    });
    const failures: RemoteRegistrationError[] = [];
    client.on('registrationFailed', (error: RemoteRegistrationError) => failures.push(error));

    registry.simulateError(503);
    client.start();
    await waitFor(() => failures.length >= 2);
    expect(client.getState().consecutiveFailures).toBeGreaterThanOrEqual(2);
    expect(failures[0].message).toBe('Registry responded with status 503');

    registry.simulateError(undefined);
    await waitFor(() => client.getState().status === 'REGISTERED');
    expect(client.getState().consecutiveFailures).toBe(0);
    expect(client.getState().instanceId).toBe('instance-1');

    await client.stop();
    expect(registry.deregistrations).toEqual(['instance-1']);
  });

  it('should not deregister when no registration ever succeeded', async () => {
    const client = new RegistrationClient({
      registrationUrl,
      name: 'orders',
      serviceUrl: 'http://orders.test:8080',
      managementUrl: 'http://orders.test:8080/actuator',
      intervalMs: 30
    });

    registry.simulateError(500);
    client.start();
    await waitFor(() => client.getState().consecutiveFailures >= 1);
    await client.stop();

    expect(registry.deregistrations).toEqual([]);
    expect(client.getState().status).toBe('STOPPED');
  });
});
