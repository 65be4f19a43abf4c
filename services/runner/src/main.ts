import { buildApp } from './server';
import { config } from './config';
import { demoMethods } from './demo/echo';

/**
 * Runner entrypoint: serves the demo runnables on the configured host/port.
 */
async function main() {
  const app = await buildApp({
    methods: demoMethods,
    namespace: config.payloadNamespace,
    logLevel: config.logLevel,
    bodyLimitBytes: config.bodyLimitBytes,
  });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Runner listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting runner:', err);
  process.exit(1);
});
