/**
 * =============================================================================
 * HEALTH ROUTES - Tests
 * =============================================================================
 *
 * Probes read live service state through the HealthSources callbacks, so the
 * readiness check can be flipped by changing what the callback returns.
 * =============================================================================
 */

import express from 'express';
import { createHealthRouter, formatBytes, formatUptime } from '../shared/routes/health.routes';
import type { QueueStats } from '../shared/resilience/request-queue';
import { startTestServer, TestServer } from './helpers/test-server';

describe('health routes', () => {
  let server: TestServer;
  let queue: QueueStats;

  beforeAll(async () => {
    const app = express();
    app.use('/', createHealthRouter({
      solverQueue: () => queue,
      geocodingCache: () => null
    }));
    server = await startTestServer(app);
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    queue = { name: 'solver', activeCount: 0, queueSize: 0, maxConcurrent: 2, maxQueueSize: 3 };
  });

  it('GET /health reports healthy', async () => {
    const response = await fetch(`${server.baseUrl}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: 'healthy', timestamp: expect.any(String) });
  });

  it('GET /health/live reports the process id', async () => {
    const response = await fetch(`${server.baseUrl}/health/live`);

    await expect(response.json()).resolves.toMatchObject({ status: 'alive', pid: process.pid });
  });

  it('GET /health/ready is ready while the solver queue has room', async () => {
    queue = { ...queue, activeCount: 2, queueSize: 2 };

    const response = await fetch(`${server.baseUrl}/health/ready`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ status: 'ready', checks: { solverQueue: true } });
  });

  it('GET /health/ready returns 503 once the solver queue is full', async () => {
    queue = { ...queue, activeCount: 2, queueSize: 3 };

    const response = await fetch(`${server.baseUrl}/health/ready`);

    expect(response.status).toBe(503);
    await expect(response.json()).resolves.toMatchObject({ status: 'not_ready', checks: { solverQueue: false } });
  });

  it('GET /health/detailed includes queue and geocoding state', async () => {
    const response = await fetch(`${server.baseUrl}/health/detailed`);

    await expect(response.json()).resolves.toMatchObject({
      status: 'healthy',
      environment: 'test',
      queues: { solver: { name: 'solver', maxQueueSize: 3 } },
      geocoding: { provider: 'nominatim', cache: null }
    });
  });

  it('GET /version names the service', async () => {
    const response = await fetch(`${server.baseUrl}/version`);

    await expect(response.json()).resolves.toMatchObject({ name: 'route-optimizer-backend', environment: 'test' });
  });

  it('GET /metrics serves the Prometheus text format', async () => {
    const response = await fetch(`${server.baseUrl}/metrics`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/plain');
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(512)).toBe('512.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB');
  });
});

describe('formatUptime', () => {
  it('omits leading zero units and always shows seconds', () => {
    expect(formatUptime(42)).toBe('42s');
    expect(formatUptime(3 * 3600 + 5)).toBe('3h 5s');
    expect(formatUptime(86400 + 61)).toBe('1d 1m 1s');
  });
});
