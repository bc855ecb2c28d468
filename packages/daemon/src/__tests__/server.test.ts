import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { HealthStatus } from '@vaultwatch/shared';
import { MonitoringServer, PROMETHEUS_CONTENT_TYPE, type MonitoringSource } from '../server';

const HEALTHY: HealthStatus = {
  is_healthy: true,
  status_code: 200,
  checks: { watcher: true, router: true },
  per_handler: {},
  emergency_disabled: false,
  uptime_seconds: 12,
};

class FakeSource implements MonitoringSource {
  health: HealthStatus = HEALTHY;
  metrics = '# HELP vaultwatch_events_processed_total Counter events_processed\n';
  failing = false;

  getHealth(): HealthStatus {
    if (this.failing) throw new Error('accessor broke');
    return this.health;
  }

  exportPrometheus(): string {
    if (this.failing) throw new Error('accessor broke');
    return this.metrics;
  }
}

let source: FakeSource;
let server: MonitoringServer;
let baseUrl: string;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  source = new FakeSource();
  server = new MonitoringServer(source, {
    host: '127.0.0.1',
    port: 0, // any free port
    authToken: 'test-secret',
    name: 'vaultwatch',
    version: '0.1.0',
  });
  await server.start();
  const address = server.address();
  if (!address) throw new Error('server did not bind');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await server.stop();
  expect(server.isListening()).toBe(false);
});

beforeEach(() => {
  source.health = HEALTHY;
  source.failing = false;
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('HTTP endpoints', () => {
  it('GET / describes the endpoints', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      name: 'vaultwatch',
      version: '0.1.0',
      endpoints: [{ path: '/' }, { path: '/health' }, { path: '/metrics' }],
    });
  });

  it('GET /health returns 200 with the health body when healthy', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(HEALTHY);
  });

  it('GET /health returns 503 when unhealthy', async () => {
    source.health = { ...HEALTHY, is_healthy: false, status_code: 503, checks: { watcher: false, router: true } };
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(503);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ is_healthy: false, checks: { watcher: false } });
  });

  it('GET /health returns 503 when the accessor throws', async () => {
    source.failing = true;
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'Health unavailable' });
  });

  it('GET /metrics requires the token', async () => {
    const res = await fetch(`${baseUrl}/metrics`);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Unauthorized' });
  });

  it('GET /metrics serves Prometheus text with a bearer token', async () => {
    const res = await fetch(`${baseUrl}/metrics`, { headers: { Authorization: 'Bearer test-secret' } });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe(PROMETHEUS_CONTENT_TYPE);
    expect(await res.text()).toBe(source.metrics);
  });

  it('GET /metrics accepts the token as a query param', async () => {
    const res = await fetch(`${baseUrl}/metrics?token=test-secret`);
    expect(res.status).toBe(200);
  });

  it('GET /metrics returns 503 when the export fails', async () => {
    source.failing = true;
    const res = await fetch(`${baseUrl}/metrics`, { headers: { Authorization: 'Bearer test-secret' } });
    expect(res.status).toBe(503);
    expect(await res.text()).toBe('# metrics unavailable\n');
  });

  it('sets security headers and hides the framework', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
    expect(res.headers.get('x-frame-options')).toBe('DENY');
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(res.headers.get('x-powered-by')).toBeNull();
  });

  it('returns JSON 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/state`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
