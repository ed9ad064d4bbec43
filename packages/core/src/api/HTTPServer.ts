import { existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import websocket from '@fastify/websocket';
import type { EventBusMessage, HttpConfig } from '@dhtwatch/shared';
import { getLogger } from '@dhtwatch/shared';
import type { EventBus } from '../events/EventBus.js';
import { registerRecordRoutes } from './routes/records.js';
import { registerStatusRoutes } from './routes/status.js';
import type { StatusContext } from './routes/status.js';

const logger = getLogger();

export type ApiContext = StatusContext;

/** Directory of the bundled dashboard, next to this package's sources. */
export function defaultStaticDir(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', '..', 'public');
}

export class HTTPServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;
  private staticDir: string;
  private eventBus: EventBus;
  private built = false;

  constructor(context: ApiContext, eventBus: EventBus, options: Omit<HttpConfig, 'enabled'>) {
    this.port = options.port;
    this.host = options.host;
    this.staticDir = options.staticDir ?? defaultStaticDir();
    this.eventBus = eventBus;

    this.app = Fastify({ logger: false });

    registerRecordRoutes(this.app, context.store);
    registerStatusRoutes(this.app, context);
  }

  /** Register plugins, the live feed and the dashboard, without listening. */
  async build(): Promise<FastifyInstance> {
    if (this.built) return this.app;
    this.built = true;

    await this.app.register(cors, { origin: true });
    await this.app.register(websocket);

    this.app.get('/ws/ticks', { websocket: true }, (socket) => {
      const handler = (message: EventBusMessage) => {
        if (!message.type.startsWith('tick:')) return;
        socket.send(JSON.stringify(message), (err) => {
          if (err) logger.debug({ err }, 'Dropped tick for a closed socket');
        });
      };

      this.eventBus.onAny(handler);

      socket.on('close', () => {
        this.eventBus.offAny(handler);
      });
    });

    if (existsSync(this.staticDir)) {
      await this.app.register(fastifyStatic, {
        root: this.staticDir,
        prefix: '/',
      });
      logger.info({ path: this.staticDir }, 'Dashboard static files registered');
    } else {
      logger.debug({ path: this.staticDir }, 'No dashboard directory, serving the API only');
    }

    await this.app.ready();
    return this.app;
  }

  async start(): Promise<void> {
    await this.build();
    await this.app.listen({ port: this.port, host: this.host });
    logger.info({ port: this.port, host: this.host }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }
}
