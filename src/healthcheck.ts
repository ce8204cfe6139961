import http from 'node:http';
import { promisify } from 'node:util';
import logger from './logger';
import { ServiceNotFoundError } from './errors';
import type { ServiceHealth } from './supervisor';

const DEFAULT_PORT = 3000;

/**
 * Health of the orchestrator as a whole.
 */
export interface HealthState {
  healthy: boolean;
  timestamp: number;
  services: Record<string, string>;
  [key: string]: unknown;
}

/**
 * What the health check server reports on.
 */
export interface HealthReporter {
  getHealthState(): Promise<HealthState>;
  getServiceHealth(name: string): Promise<ServiceHealth>;
}

/**
 * Status information for the health check server.
 */
export interface HealthCheckStatus {
  listening: boolean;
  port: number;
}

/**
 * Service handle for the health check server.
 */
export interface HealthCheckService {
  status(): HealthCheckStatus;
  close(): Promise<void>;
}

/**
 * The parts of an HTTP request and response the handler touches.
 */
export interface HealthRequest {
  method?: string;
  url?: string;
}

export interface HealthResponse {
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(body?: string): unknown;
}

export type HealthRequestHandler = (req: HealthRequest, res: HealthResponse) => void;

const sendJson = (res: HealthResponse, statusCode: number, body: unknown): void => {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
};

/**
 * Request handler behind the health check server.
 *
 * - GET /health: 200 when every service is RUNNING, else 503
 * - GET /health/<name>: health detail of one service, 404 if unknown
 *
 * Other endpoints return 404.
 */
export const createHealthRequestHandler = (reporter: HealthReporter): HealthRequestHandler => (req, res) => {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const match = /^\/health(?:\/([^/]+))?\/?$/.exec(url.pathname);

  if (req.method !== 'GET' || !match) {
    res.writeHead(404);
    res.end();
    return;
  }

  const name = match[1] ? decodeURIComponent(match[1]) : undefined;

  if (name === undefined) {
    reporter
      .getHealthState()
      .then((state) => sendJson(res, state.healthy ? 200 : 503, state))
      .catch((err: unknown) => {
        logger.error({ err }, 'Error getting health state');
        sendJson(res, 503, { healthy: false, error: 'Failed to get health state' });
      });
    return;
  }

  reporter
    .getServiceHealth(name)
    .then((health) => sendJson(res, 200, health))
    .catch((err: unknown) => {
      if (err instanceof ServiceNotFoundError) {
        sendJson(res, 404, { error: err.message });
        return;
      }
      logger.error({ err, service: name }, 'Error getting service health');
      sendJson(res, 503, { error: 'Failed to get service health' });
    });
};

/**
 * Start the orchestrator's HTTP health check server (port 3000 by default).
 */
export const startHealthCheckServer = (reporter: HealthReporter, port = DEFAULT_PORT): HealthCheckService => {
  const server = http.createServer(createHealthRequestHandler(reporter));

  server.listen(port, () => {
    logger.info({ port }, 'Health check server listening');
  });

  return {
    close: promisify(server.close.bind(server)),

    status: (): HealthCheckStatus => ({
      listening: server.listening,
      port,
    }),
  };
};
