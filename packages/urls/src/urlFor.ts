import { AppError, type AppServer, type UrlValues } from '@crossurls/app-server';

export interface UrlForOptions {
  /** Only consider rules accepting this HTTP method */
  method?: string;
}

/**
 * Build the external URL of an endpoint of this application or of the
 * application mirrored by its UrlsBuilder.
 *
 * Unlike `UrlMap.build`, the result is always absolute: scheme and host come
 * from the prefixes configured for the builder.
 */
export function urlFor(
  server: AppServer,
  endpoint: string,
  values: UrlValues = {},
  options: UrlForOptions = {},
): string {
  if (!server.urls) {
    throw new AppError(`Application '${server.name}' has no URL builder`, 500, 'URLS_BUILDER_MISSING');
  }
  return server.urls.build(endpoint, values, options.method);
}
