import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseConfig } from '@dhtwatch/shared';
import { openDatabase } from '../db/Database.js';
import { MetricStore } from '../db/MetricStore.js';
import { EventBus } from '../events/EventBus.js';
import { HTTPServer, defaultStaticDir } from '../api/HTTPServer.js';

describe('HTTPServer', () => {
  let store: MetricStore;
  let staticDir: string;
  let server: HTTPServer;

  beforeEach(() => {
    store = new MetricStore(openDatabase(':memory:'));
    staticDir = mkdtempSync(join(tmpdir(), 'dhtwatch-static-'));
    writeFileSync(join(staticDir, 'index.html'), '<!doctype html><title>dhtwatch</title>');
    const config = parseConfig({}, staticDir);
    server = new HTTPServer(
      {
        store,
        config,
        getLastTick: () => null,
        inspectProcess: async () => null,
      },
      new EventBus(),
      { host: '127.0.0.1', port: 0, staticDir },
    );
  });

  afterEach(async () => {
    await server.stop();
    store.close();
    rmSync(staticDir, { recursive: true, force: true });
  });

  it('should serve the API once built', async () => {
    const app = await server.build();

    const response = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('cold');
  });

  it('should serve the dashboard from the static directory', async () => {
    const app = await server.build();

    const response = await app.inject({ method: 'GET', url: '/index.html' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('<!doctype html><title>dhtwatch</title>');
  });

  it('should build only once', async () => {
    const first = await server.build();
    const second = await server.build();

    expect(second).toBe(first);
  });

  it('should report its listen address', () => {
    expect(server.getAddress()).toBe('http://127.0.0.1:0');
  });

  it('should default to the bundled public directory', () => {
    expect(defaultStaticDir().endsWith(join('core', 'public'))).toBe(true);
  });
});
