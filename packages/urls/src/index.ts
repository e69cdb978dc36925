/**
 * @crossurls/urls
 *
 * External URL building across two applications deployed side by side.
 *
 * @example
 * ```typescript
 * import { createAppServer } from '@crossurls/app-server';
 * import { createAppsUrlsBuilderFactory, urlFor } from '@crossurls/urls';
 *
 * const server = await createAppServer({
 *   name: 'ui',
 *   config: { SITE_UI_URL: 'https://main.example.org', SITE_API_URL: 'https://api.example.org' },
 *   blueprintEntryPoints: ['ui.blueprints'],
 *   urlsBuilderFactory: createAppsUrlsBuilderFactory('SITE_UI_URL', 'SITE_API_URL', ['api.blueprints']),
 * });
 *
 * urlFor(server, 'records.detail', { id: 'abc123' });
 * ```
 */

export { AppsUrlsBuilder } from './appsUrlsBuilder.js';
export type { SetupOptions } from './appsUrlsBuilder.js';
export { createAppsUrlsBuilderFactory } from './factory.js';
export { urlFor } from './urlFor.js';
export type { UrlForOptions } from './urlFor.js';
