// Status Server - Minimal HTTP server for host health checks and relay status

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import type { RelayStatus } from './types.js';

export interface StatusReply {
  statusCode: number;
  body: Record<string, unknown>;
}

/**
 * Answers one request. `/health` stays 200 while the relay runs so the host
 * only restarts a relay that has stopped; details live under `/status`.
 */
export function routeStatusRequest(method: string | undefined, url: string | undefined, status: RelayStatus): StatusReply {
  const path = (url ?? '').split('?')[0];
  if (method !== 'GET') {
    return { statusCode: 404, body: { error: 'Not found' } };
  }

  if (path === '/health') {
    return {
      statusCode: status.running ? 200 : 503,
      body: {
        status: status.running ? 'ok' : 'stopped',
        wsConnected: status.transport.connection === 'connected',
        monitorDegraded: status.monitor.degraded,
      },
    };
  }

  if (path === '/status') {
    return { statusCode: 200, body: { ...status } };
  }

  return { statusCode: 404, body: { error: 'Not found' } };
}

export class HealthServer {
  private server: Server | null = null;
  private port: number;
  private getStatus: () => RelayStatus;
  private logger: Logger;

  constructor(port: number, getStatus: () => RelayStatus, logger?: Logger) {
    this.port = port;
    this.getStatus = getStatus;
    this.logger = logger ?? silentLogger;
  }

  start(): Promise<void> {
    if (this.server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => this.handleRequest(req, res));

      server.on('error', reject);
      server.listen(this.port, () => {
        this.server = server;
        this.logger.info(`[relay] Status server listening on port ${this.port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(() => {
        this.server = null;
        this.logger.info('[relay] Status server stopped');
        resolve();
      });
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse) {
    const reply = routeStatusRequest(req.method, req.url, this.getStatus());
    res.writeHead(reply.statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(reply.body));
  }
}
