import { config } from './config/index.js';
import { buildApp } from './app.js';
import { getSyncService } from './services/sync/index.js';

async function start() {
  const service = getSyncService();
  const server = await buildApp(service);

  const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, shutting down gracefully...`);
    // Let the running job finish its current track before closing
    service.stop();
    await server.close();
    await service.jobs.whenIdle();
    process.exit(0);
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  try {
    await server.listen({
      port: config.server.port,
      host: config.server.host,
    });
  } catch (error) {
    server.log.error(error, 'Failed to start server');
    process.exit(1);
  }
}

void start();
