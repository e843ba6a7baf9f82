import 'dotenv/config';
import express from 'express';
import crypto from 'crypto';
import { loadConfig } from '../core/utils';
import { createRebalancer } from '../rebalancing/factory';
import { createHandlers } from './handlers';
import { registerRoutes } from './routes';

const config = loadConfig();
const rebalancer = createRebalancer(config);
const app = express();
const csrfToken = crypto.randomUUID();

registerRoutes(
  app,
  createHandlers({
    service: rebalancer.service,
    rules: rebalancer.rules,
    history: rebalancer.history,
    snapshots: rebalancer.snapshots,
    sectors: rebalancer.sectors,
    timeWindowSeconds: config.chains.timeWindowSeconds
  }),
  csrfToken
);

const monitor = rebalancer.createFillMonitor();

const startServer = (port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    console.log(`Rebalancer API running at http://${bind}:${boundPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      const nextBind = bind === '127.0.0.1' ? '0.0.0.0' : bind;
      console.warn(`UI port ${port} blocked (${err.code}); retrying on bind ${nextBind} and an ephemeral port.`);
      startServer(0, nextBind, false);
      return;
    }
    console.error('UI failed to start', err);
    monitor.stop();
    process.exit(1);
  });
};

const shutdown = () => {
  monitor.stop();
  process.exit(0);
};

monitor
  .prime()
  .then((known) => {
    console.log(`Fill monitor primed with ${known} existing fills.`);
    monitor.start();
  })
  .catch((err) => {
    console.error('Fill monitor failed to prime; fills will not trigger rebalancing', err);
  });

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

startServer(config.uiPort, config.uiBind);
