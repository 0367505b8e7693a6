import http from 'http';
import { createApp } from './app';
import { loadConfig } from './core/config';
import { logger } from './core/log';

const config = loadConfig();
const { app } = createApp(config);
const server = http.createServer(app);
process.title = 'hit-router';

server.listen(config.port, () => {
  logger.info('server.listening', { port: config.port });
});

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
let shuttingDown = false;
function shutdown() {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('server.shutdown');
  server.close((err) => {
    if (err) logger.warn('server.close_failed', { err: String(err) });
    process.exit(0);
  });
  // Give open connections a moment before forcing exit
  setTimeout(() => process.exit(0), 1000).unref();
}
