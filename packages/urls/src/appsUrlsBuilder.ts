/**
 * Apps URLs Builder
 *
 * Builds external URLs for endpoints of the current application and of a
 * second application that is never loaded in this process. The second
 * application's routes are mirrored once, at setup, into a handler-free
 * UrlMap; each build tries the live application first and falls back to the
 * mirror.
 */

import {
  AppError,
  BLUEPRINTS_URL_PREFIXES,
  BuildError,
  Rule,
  UrlMap,
  createAppServer,
  type AppServer,
  type EntryPointSource,
  type UrlValues,
  type UrlsBuilder,
} from '@crossurls/app-server';

export interface SetupOptions {
  /**
   * Where the other application's entry points are discovered
   * (default: the hosting application's source).
   */
  entryPoints?: EntryPointSource;
}

export class AppsUrlsBuilder implements UrlsBuilder {
  readonly appPrefixKey: string;
  readonly otherAppPrefixKey: string;
  readonly otherAppEntryPoints: readonly string[];
  private server: AppServer | null = null;
  private mirror: UrlMap | null = null;

  /**
   * @param appPrefixKey - config key holding this application's external base URL
   * @param otherAppPrefixKey - config key holding the other application's external base URL
   * @param otherAppEntryPoints - entry-point groups contributing the other application's blueprints
   */
  constructor(appPrefixKey: string, otherAppPrefixKey: string, otherAppEntryPoints: readonly string[]) {
    this.appPrefixKey = appPrefixKey;
    this.otherAppPrefixKey = otherAppPrefixKey;
    this.otherAppEntryPoints = otherAppEntryPoints;
  }

  /**
   * Mirror the other application's routes.
   *
   * Runs while the hosting application is being assembled, outside of any
   * request. A throwaway application is created from the other
   * application's entry points and never started; only its rules' paths and
   * endpoints are kept, so mirrored rules accept any method.
   */
  async setup(server: AppServer, options: SetupOptions = {}): Promise<void> {
    const shell = await createAppServer({
      name: `${server.name}:apps-urls-builder`,
      config: { [BLUEPRINTS_URL_PREFIXES]: server.config.get(BLUEPRINTS_URL_PREFIXES) ?? {} },
      entryPoints: options.entryPoints ?? server.entryPoints,
      blueprintEntryPoints: this.otherAppEntryPoints,
      logger: server.logger,
      requestLogging: false,
      compression: false,
      helmet: false,
    });

    const mirror = new UrlMap(
      shell.urlMap
        .iterRules()
        .map((rule) => new Rule(rule.path, { endpoint: rule.endpoint })),
    );

    this.server = server;
    this.mirror = mirror.freeze();

    server.logger.info('Mirrored routes of other application', {
      entryPoints: this.otherAppEntryPoints,
      routes: mirror.iterRules().length,
    });
  }

  /** The mirrored route table, once set up */
  get urlMap(): UrlMap | null {
    return this.mirror;
  }

  /**
   * External base URL stored under a configuration key; read on every call.
   */
  prefix(key: string): string {
    return this.host().server.config.requireString(key);
  }

  /**
   * Build the full URL of an endpoint of either application.
   */
  build(endpoint: string, values: UrlValues, method?: string): string {
    const { server, mirror } = this.host();

    let path: string;
    try {
      path = server.urlMap.build(endpoint, values, method);
    } catch (err) {
      if (!(err instanceof BuildError)) throw err;

      // Not an endpoint of this application: try the other one
      const otherPath = mirror.build(endpoint, values, method);
      server.logger.debug('Built url from mirrored routes', { endpoint });
      return this.prefix(this.otherAppPrefixKey) + otherPath;
    }

    return this.prefix(this.appPrefixKey) + path;
  }

  private host(): { server: AppServer; mirror: UrlMap } {
    if (!this.server || !this.mirror) {
      throw new AppError('AppsUrlsBuilder used before setup()', 500, 'URLS_BUILDER_NOT_READY');
    }
    return { server: this.server, mirror: this.mirror };
  }
}
