import express, { type Express } from 'express';
import { createServer, type Server } from 'http';
import type { CapabilityDiscovery, HealthStatus } from '@vaultwatch/shared';
import { requireToken } from './auth';
import { errorMessage } from './errors';

// Parameter order as express re-serializes it
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; charset=utf-8; version=0.0.4';

/** The daemon accessors the monitoring routes format. */
export interface MonitoringSource {
  getHealth(): HealthStatus;
  exportPrometheus(): string;
}

export interface MonitoringAppOptions {
  name?: string;
  version?: string;
  /** Bearer token required on /metrics */
  authToken?: string;
}

export interface MonitoringServerOptions extends MonitoringAppOptions {
  host: string;
  port: number;
}

/**
 * Read-only routes over the daemon. No business logic lives here: each
 * route formats one accessor.
 */
export function createMonitoringApp(source: MonitoringSource, options: MonitoringAppOptions = {}): Express {
  const app = express();
  const discovery: CapabilityDiscovery = {
    name: options.name ?? 'vaultwatch',
    version: options.version ?? '0.1.0',
    endpoints: [
      { method: 'GET', path: '/', description: 'Capability discovery' },
      { method: 'GET', path: '/health', description: 'Aggregated health; 200 when healthy, 503 otherwise' },
      { method: 'GET', path: '/metrics', description: 'Prometheus text exposition' },
    ],
  };

  // Security headers
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.get('/', (_req, res) => {
    res.json(discovery);
  });

  // Liveness probes stay unauthenticated
  app.get('/health', (_req, res) => {
    try {
      const health = source.getHealth();
      res.status(health.status_code).json(health);
    } catch (err) {
      console.warn('[monitor] Health accessor failed:', errorMessage(err));
      res.status(503).json({ error: 'Health unavailable' });
    }
  });

  app.get('/metrics', requireToken(options.authToken), (_req, res) => {
    let body: string;
    try {
      body = source.exportPrometheus();
    } catch (err) {
      console.warn('[monitor] Metrics export failed:', errorMessage(err));
      res.status(503).type('text/plain').send('# metrics unavailable\n');
      return;
    }
    res.setHeader('Content-Type', PROMETHEUS_CONTENT_TYPE);
    res.send(body);
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export class MonitoringServer {
  private server: Server | null = null;
  private app: Express;

  constructor(
    source: MonitoringSource,
    private options: MonitoringServerOptions
  ) {
    this.app = createMonitoringApp(source, options);
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bound address once started; port 0 in the options picks a free port. */
  address(): { host: string; port: number } | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  async start(): Promise<void> {
    if (this.server) return;
    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });
    this.server = server;
    server.on('error', (err) => console.warn('[monitor] Server error:', errorMessage(err)));
    const addr = this.address();
    console.log(`[monitor] Listening on http://${this.options.host}:${addr?.port ?? this.options.port}`);
  }

  /** Close the listener and every open connection, so shutdown never waits on a client. */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    console.log('[monitor] Stopped');
  }
}
