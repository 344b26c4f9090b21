import { ConsoleLogger } from '@agri-telemetry/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfigFromEnv } from './config/env.js';
import { TelemetryCore } from './services/core/telemetry-core.js';

async function main() {
  const config = loadConfigFromEnv();
  const logger = new ConsoleLogger('server', config.logLevel);

  const core = new TelemetryCore(config.core, { logger: logger.child('core') });
  const app = buildApp(core, { corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway } = buildHttpServer(app, core, logger);

  httpServer.listen(config.port, () => {
    logger.info(`listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    logger.info('shutting down...');
    core.disconnect();
    await wsGateway.close();
    httpServer.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error('shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
