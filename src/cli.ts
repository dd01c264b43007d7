#!/usr/bin/env node

/**
 * Standalone host: an express server with the actuator mounted at /actuator
 */

import { config as loadDotenv } from 'dotenv';
import express from 'express';
import { Server } from 'http';
import { Command } from 'commander';
import { AgentEngine } from './agent';
import { ActuatorConfig, ActuatorConfigManager } from './infrastructure/config';
import { createActuatorRouter, httpTraceMiddleware } from './infrastructure/http';
import { gracefulShutdown } from './shared/utils/graceful-shutdown';
import { logger } from './shared/utils/logger';

export interface CliOptions {
  port: string;
  config?: string;
  registrationUrl?: string;
  appName?: string;
}

const cliLogger = logger.child('cli');

/**
 * Command-line options override the file or environment configuration.
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ActuatorConfig {
  const base = options.config
    ? ActuatorConfigManager.loadFromFile(options.config)
    : ActuatorConfigManager.loadFromEnvironment({
      ACTUATOR_APP_NAME: options.appName ?? 'actuator-agent',
      ACTUATOR_APP_URL: `http://localhost:${options.port}`,
      ...env
    });

  const appUrl = base.appUrl ?? `http://localhost:${options.port}`;
  return ActuatorConfigManager.validate({
    ...base,
    appName: options.appName ?? base.appName,
    appUrl,
    managementUrl: base.managementUrl ?? `${appUrl}/actuator`,
    registrationUrl: options.registrationUrl ?? base.registrationUrl
  });
}

function listen(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

async function main(argv: string[]): Promise<void> {
  loadDotenv();

  const program = new Command()
    .name('actuator-agent')
    .description('Serve actuator endpoints and register with a monitoring registry')
    .option('-p, --port <port>', 'port to listen on', process.env.PORT ?? '8080')
    .option('-c, --config <path>', 'YAML configuration file')
    .option('-r, --registration-url <url>', 'registry registration endpoint')
    .option('-n, --app-name <name>', 'application name reported to the registry');
  program.parse(argv);

  const options = program.opts<CliOptions>();
  const engine = new AgentEngine(resolveConfig(options));

  const app = express();
  app.use(httpTraceMiddleware(engine));
  app.use('/actuator', createActuatorRouter(engine));
  app.get('/', (_req, res) => {
    res.json({ name: engine.config.appName, actuator: engine.getManagementUrl() });
  });

  const server = await listen(app, Number(options.port));
  engine.start();
  cliLogger.info(`Listening on port ${options.port}, actuator at ${engine.getManagementUrl()}`);

  gracefulShutdown(async () => {
    await engine.stop();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });
}

if (require.main === module) {
  main(process.argv).catch(error => {
    cliLogger.error('Failed to start actuator agent:', error);
    process.exit(1);
  });
}
