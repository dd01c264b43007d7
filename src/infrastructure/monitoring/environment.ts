import { EnvironmentReport, PropertyValue } from '../../types';

export const SYSTEM_ENVIRONMENT_SOURCE = 'systemEnvironment';
export const SCRUBBED_VALUE = '******';

const SENSITIVE_KEY_PATTERN = /secret|password|key|token|credentials|vcap_services/i;

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERN.test(key);
}

/**
 * Snapshot of the process environment grouped under a single property source.
 * Values of keys that look like credentials are masked.
 */
export function getEnvironmentReport(env: NodeJS.ProcessEnv = process.env): EnvironmentReport {
  const properties: Record<string, PropertyValue> = {};
  for (const key of Object.keys(env).sort()) {
    const value = env[key];
    if (value === undefined) {
      continue;
    }
    properties[key] = { value: isSensitiveKey(key) ? SCRUBBED_VALUE : value };
  }

  return {
    activeProfiles: [],
    propertySources: [{ name: SYSTEM_ENVIRONMENT_SOURCE, properties }]
  };
}
