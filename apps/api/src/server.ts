import { buildApp, buildHttpServer } from './app.js';
import { apiConfigFromEnv } from './config/simulator-config.js';

async function main() {
  const { port } = apiConfigFromEnv();
  const app = buildApp();
  const { httpServer, wsGateway } = buildHttpServer(app);

  httpServer.listen(port, () => {
    console.log(`[server] listening on http://0.0.0.0:${port}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    wsGateway.close();
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
