import Fastify from 'fastify';
import { ContainerRegistry } from './containers/registry';
import { registerRunnerRoutes } from './routes/runner';
import type { LogLevel } from './config';
import type { RunnableMethods } from './contracts/runnable';

export interface BuildAppOptions {
  methods: RunnableMethods;
  registry?: ContainerRegistry;
  namespace?: string;
  /** Omit to run without a logger. */
  logLevel?: LogLevel;
  bodyLimitBytes?: number;
}

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
    bodyLimit: options.bodyLimitBytes,
  });

  app.get('/healthz', async () => ({ status: 'ok', methods: Object.keys(options.methods) }));

  await registerRunnerRoutes(app, {
    methods: options.methods,
    registry: options.registry ?? new ContainerRegistry(),
    namespace: options.namespace,
  });
  return app;
}
