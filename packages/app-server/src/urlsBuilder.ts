import type { UrlValues } from './errors.js';
import type { AppServer } from './server.js';

/**
 * Capability held by an application for producing external URLs.
 *
 * The application factory only knows this interface, so any implementation
 * can be plugged in through `urlsBuilderFactory` without touching call sites.
 */
export interface UrlsBuilder {
  build(endpoint: string, values: UrlValues, method?: string): string;
}

export type UrlsBuilderFactory = (server: AppServer) => UrlsBuilder | Promise<UrlsBuilder>;
