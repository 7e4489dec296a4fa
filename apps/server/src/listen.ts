// apps/server/src/listen.ts
//
// Starts an Express app as a background listener. The returned promise
// settles once the socket is bound: it resolves with the actual port (useful
// with port 0) or rejects with the bind error, e.g. EADDRINUSE.

import http from 'node:http';
import type { Express } from 'express';
import type { Logger } from 'pino';

export type RunningListener = {
  name: string;
  host: string;
  port: number;
  close: () => Promise<void>;
};

export function startListener(
  name: string,
  app: Express,
  opts: { host: string; port: number },
  log: Logger,
): Promise<RunningListener> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);

    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      server.on('error', (err) => log.error({ err, listener: name }, 'listener error'));
      const addr = server.address();
      const port = typeof addr === 'object' && addr !== null ? addr.port : opts.port;
      log.info({ listener: name, host: opts.host, port }, 'listening');
      resolve({ name, host: opts.host, port, close: () => closeServer(server) });
    };

    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(opts.port, opts.host);
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    // Idle keep-alive sockets would otherwise hold close() open
    server.closeIdleConnections();
  });
}
