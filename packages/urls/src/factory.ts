import type { UrlsBuilderFactory } from '@crossurls/app-server';
import { AppsUrlsBuilder, type SetupOptions } from './appsUrlsBuilder.js';

/**
 * Create a `urlsBuilderFactory` for an application deployed next to another one.
 *
 * The factory produces an AppsUrlsBuilder, but the application only sees a
 * UrlsBuilder: a different implementation can be swapped in by passing
 * another factory to `createAppServer`.
 *
 * @param appPrefixKey - config key holding this application's external base URL
 * @param otherAppPrefixKey - config key holding the other application's external base URL
 * @param otherAppEntryPoints - entry-point groups to load the other application's blueprints from
 * @param setupOptions - forwarded to `AppsUrlsBuilder.setup`
 */
export function createAppsUrlsBuilderFactory(
  appPrefixKey: string,
  otherAppPrefixKey: string,
  otherAppEntryPoints: readonly string[],
  setupOptions: SetupOptions = {},
): UrlsBuilderFactory {
  return async (server) => {
    const builder = new AppsUrlsBuilder(appPrefixKey, otherAppPrefixKey, otherAppEntryPoints);
    await builder.setup(server, setupOptions);
    return builder;
  };
}
