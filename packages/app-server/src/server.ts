/**
 * Application Server Factory
 *
 * Creates an Express application assembled from blueprints:
 * - CORS, JSON parsing, compression, helmet
 * - Request logging with request IDs
 * - Standard /healthz endpoint
 * - Blueprints registered directly or discovered through entry points
 * - A live UrlMap mirroring every registered route, for reverse building
 * - An optional UrlsBuilder produced once the blueprints are in place
 * - Not-found and error handling middleware
 * - Graceful shutdown
 */

import express, { Router, type Application, type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { Blueprint, assertSupportedPath, blueprintUrlPrefixes, joinPaths, type HttpMethod } from './blueprint.js';
import { loadBlueprints } from './blueprintLoader.js';
import { AppConfig } from './config.js';
import { ManifestEntryPointSource, type EntryPointSource } from './entryPoints.js';
import { AppError, BlueprintError } from './errors.js';
import { createLogger, type StructuredLogger } from './logger.js';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createRequestLogger } from './middleware/logging.js';
import { Rule, UrlMap } from './routing/urlMap.js';
import type { UrlsBuilder, UrlsBuilderFactory } from './urlsBuilder.js';

export interface AppServerConfig {
  /** Application name (used for logging and health check) */
  name: string;

  /** Port to listen on (default: env PORT or 4000) */
  port?: number;

  /** Application configuration */
  config?: AppConfig | Record<string, unknown>;

  /** Where entry points are discovered (default: plugin manifests under process.cwd()) */
  entryPoints?: EntryPointSource;

  /** Entry-point groups whose blueprints are loaded at creation */
  blueprintEntryPoints?: readonly string[];

  /** Blueprints registered before any entry point is loaded */
  blueprints?: readonly Blueprint[];

  /** Produces the application's UrlsBuilder once its blueprints are registered */
  urlsBuilderFactory?: UrlsBuilderFactory;

  logger?: StructuredLogger;

  /** Whether to log every request (default: true) */
  requestLogging?: boolean;

  /** Allowed CORS origins (default: all) */
  corsOrigins?: readonly string[];

  /** Whether to enable compression (default: true) */
  compression?: boolean;

  /** Whether to enable helmet security headers (default: true) */
  helmet?: boolean;
}

export interface AppServer {
  readonly name: string;

  /** The Express application */
  readonly app: Express;

  readonly config: AppConfig;

  /** Live route table of this application */
  readonly urlMap: UrlMap;

  readonly entryPoints: EntryPointSource;

  readonly logger: StructuredLogger;

  readonly blueprints: ReadonlyMap<string, Blueprint>;

  /** URL builder attached at creation, or null when none is configured */
  urls: UrlsBuilder | null;

  registerBlueprint(blueprint: Blueprint): void;

  /** Start listening on the configured port */
  start(): Promise<void>;

  /** Graceful shutdown */
  stop(): Promise<void>;
}

const EXPRESS_VERBS = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  OPTIONS: 'options',
  HEAD: 'head',
} as const satisfies Record<HttpMethod, string>;

const servers = new WeakMap<Application, AppServer>();

/**
 * The AppServer owning the application a request was routed through.
 */
export function appServerOf(req: Request): AppServer {
  const server = servers.get(req.app);
  if (!server) {
    throw new AppError('Request was not routed through an AppServer', 500, 'NO_APP_SERVER');
  }
  return server;
}

export async function createAppServer(options: AppServerConfig): Promise<AppServer> {
  const {
    name,
    port = parseInt(process.env.PORT || '4000', 10),
    blueprintEntryPoints = [],
    blueprints: initialBlueprints = [],
    urlsBuilderFactory,
    logger = createLogger(options.name),
    requestLogging = true,
    corsOrigins = [],
    compression: enableCompression = true,
    helmet: enableHelmet = true,
  } = options;

  const config = options.config instanceof AppConfig
    ? options.config
    : new AppConfig(options.config ?? {});
  const entryPoints = options.entryPoints ?? new ManifestEntryPointSource(process.cwd(), { logger });

  const app = express();
  const router = Router();
  const urlMap = new UrlMap();
  const blueprints = new Map<string, Blueprint>();
  let httpServer: ReturnType<Express['listen']> | null = null;

  // ─── Base Middleware ────────────────────────────────────────────────

  app.use(cors({
    origin: corsOrigins.length === 0 ? true : [...corsOrigins],
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    exposedHeaders: ['X-Request-ID'],
  }));

  if (enableHelmet) {
    app.use(helmet());
  }

  if (enableCompression) {
    app.use(compression());
  }

  app.use(express.json({ limit: '1mb' }));

  if (requestLogging) {
    app.use(createRequestLogger(logger));
  }

  // ─── Health Check ──────────────────────────────────────────────────

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: name,
      routes: urlMap.iterRules().length,
      timestamp: new Date().toISOString(),
    });
  });

  // ─── Blueprint Routes ──────────────────────────────────────────────

  app.use(router);

  // ─── Error Handler (must be last) ──────────────────────────────────

  app.use(notFoundHandler);
  app.use(createErrorHandler({ logger }));

  function registerBlueprint(blueprint: Blueprint): void {
    if (blueprints.has(blueprint.name)) {
      throw new BlueprintError(`A blueprint named '${blueprint.name}' is already registered on '${name}'`);
    }

    const overrides = blueprintUrlPrefixes(config);
    const prefix = Object.hasOwn(overrides, blueprint.name) ? overrides[blueprint.name] : blueprint.urlPrefix;

    for (const definition of blueprint.routes) {
      const path = joinPaths(prefix, definition.path);
      assertSupportedPath(path, blueprint.name);
      const route = router.route(path);
      for (const method of definition.methods) {
        route[EXPRESS_VERBS[method]](definition.handler);
      }
      urlMap.add(new Rule(path, { endpoint: `${blueprint.name}.${definition.endpoint}`, methods: definition.methods }));
    }

    blueprints.set(blueprint.name, blueprint);
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  const shutdownHandler = () => {
    stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      });
  };

  const start = async () => {
    if (httpServer) return;

    await new Promise<void>((resolve, reject) => {
      const listener = app.listen(port, () => {
        httpServer = listener;
        resolve();
      });
      listener.once('error', reject);
    });

    process.on('SIGTERM', shutdownHandler);
    process.on('SIGINT', shutdownHandler);
    logger.info('Server listening', { port });
  };

  const stop = async () => {
    process.off('SIGTERM', shutdownHandler);
    process.off('SIGINT', shutdownHandler);

    const current = httpServer;
    httpServer = null;
    if (current) {
      await new Promise<void>((resolve, reject) => {
        current.close((err) => (err ? reject(err) : resolve()));
      });
    }

    logger.info('Shutdown complete');
  };

  const server: AppServer = {
    name,
    app,
    config,
    urlMap,
    entryPoints,
    logger,
    blueprints,
    urls: null,
    registerBlueprint,
    start,
    stop,
  };
  servers.set(app, server);

  // ─── Assembly ─────────────────────────────────────────────────────

  for (const blueprint of initialBlueprints) {
    registerBlueprint(blueprint);
  }
  await loadBlueprints(server, { entryPoints: blueprintEntryPoints });

  if (urlsBuilderFactory) {
    server.urls = await urlsBuilderFactory(server);
  }

  logger.debug('Application created', {
    blueprints: Array.from(blueprints.keys()),
    routes: urlMap.iterRules().length,
  });

  return server;
}
