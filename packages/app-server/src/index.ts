/**
 * @crossurls/app-server
 *
 * Express application factory for blueprint-based applications, with a
 * reverse-routing table and entry-point discovery of plugin blueprints.
 *
 * @example
 * ```typescript
 * import { Blueprint, createAppServer } from '@crossurls/app-server';
 *
 * const records = new Blueprint('records', { urlPrefix: '/records' })
 *   .get('/:id', 'detail', (req, res) => res.json({ id: req.params.id }));
 *
 * const server = await createAppServer({ name: 'main', blueprints: [records] });
 * server.urlMap.build('records.detail', { id: 'abc123' }); // '/records/abc123'
 * await server.start();
 * ```
 */

export { createAppServer, appServerOf } from './server.js';
export type { AppServerConfig, AppServer } from './server.js';
export type { UrlsBuilder, UrlsBuilderFactory } from './urlsBuilder.js';
export {
  Blueprint,
  BLUEPRINTS_URL_PREFIXES,
  assertSupportedPath,
  HTTP_METHODS,
  blueprintUrlPrefixes,
  joinPaths,
} from './blueprint.js';
export type { BlueprintOptions, HttpMethod, RouteDefinition, RouteOptions } from './blueprint.js';
export { loadBlueprints } from './blueprintLoader.js';
export type { LoadBlueprintsOptions } from './blueprintLoader.js';
export { ManifestEntryPointSource, StaticEntryPointSource, PluginManifestSchema } from './entryPoints.js';
export type { EntryPoint, EntryPointSource, PluginManifest } from './entryPoints.js';
export { Rule, UrlMap } from './routing/urlMap.js';
export type { RuleOptions } from './routing/urlMap.js';
export { AppConfig, loadConfig } from './config.js';
export type { LoadConfigOptions } from './config.js';
export {
  AppError,
  BuildError,
  MissingConfigError,
  EntryPointError,
  BlueprintError,
  NotFoundError,
} from './errors.js';
export type { UrlValue, UrlValues } from './errors.js';
export { createLogger } from './logger.js';
export type { StructuredLogger } from './logger.js';
export { createRequestLogger } from './middleware/logging.js';
export { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
export type { ErrorHandlerOptions } from './middleware/errorHandler.js';
