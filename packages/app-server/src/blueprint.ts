/**
 * Blueprints
 *
 * A blueprint is a named group of routes contributed by a plugin. Endpoint
 * names are namespaced by the blueprint: route `detail` of blueprint
 * `records` registers as `records.detail`.
 */

import type { RequestHandler } from 'express';
import { parse } from 'path-to-regexp';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { BlueprintError } from './errors.js';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'HEAD'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface RouteDefinition {
  path: string;
  /** Endpoint name local to the blueprint */
  endpoint: string;
  methods: HttpMethod[];
  handler: RequestHandler;
}

export interface BlueprintOptions {
  /** Prefix applied to every route path, unless overridden by configuration */
  urlPrefix?: string;
}

export interface RouteOptions {
  methods?: HttpMethod[];
}

export class Blueprint {
  readonly name: string;
  readonly urlPrefix: string;
  private readonly definitions: RouteDefinition[] = [];

  constructor(name: string, options: BlueprintOptions = {}) {
    if (!name || name.includes('.')) {
      throw new BlueprintError(`Invalid blueprint name '${name}': must be non-empty and contain no '.'`);
    }
    this.name = name;
    this.urlPrefix = options.urlPrefix ?? '';
  }

  get routes(): readonly RouteDefinition[] {
    return this.definitions;
  }

  route(path: string, endpoint: string, handler: RequestHandler, options: RouteOptions = {}): this {
    if (!endpoint || endpoint.includes('.')) {
      throw new BlueprintError(`Invalid endpoint '${endpoint}' in blueprint '${this.name}'`);
    }
    assertSupportedPath(path, this.name);
    this.definitions.push({ path, endpoint, methods: options.methods ?? ['GET'], handler });
    return this;
  }

  get(path: string, endpoint: string, handler: RequestHandler): this {
    return this.route(path, endpoint, handler, { methods: ['GET'] });
  }

  post(path: string, endpoint: string, handler: RequestHandler): this {
    return this.route(path, endpoint, handler, { methods: ['POST'] });
  }
}

// ─── Route Paths ─────────────────────────────────────────────────────────────

const SUPPORTED_SYNTAX = "static segments, ':name', ':name?' and ':name(pattern)'";

/**
 * Only the route syntax that Express and the reverse router read alike is
 * accepted: unnamed groups, `*` wildcards and repeated parameters are not.
 */
export function assertSupportedPath(path: string, blueprint: string): void {
  const unsupported = () =>
    new BlueprintError(`Unsupported route path '${path}' in blueprint '${blueprint}': use ${SUPPORTED_SYNTAX}`);

  let tokens: ReturnType<typeof parse>;
  try {
    tokens = parse(path);
  } catch (err) {
    if (err instanceof TypeError) throw unsupported();
    throw err;
  }

  for (const token of tokens) {
    if (typeof token === 'string') continue;
    if (typeof token.name === 'number' || token.modifier === '*' || token.modifier === '+') {
      throw unsupported();
    }
  }
}

// ─── URL Prefixes ────────────────────────────────────────────────────────────

export const BLUEPRINTS_URL_PREFIXES = 'BLUEPRINTS_URL_PREFIXES';

const UrlPrefixesSchema = z.record(z.string());

/**
 * Read the blueprint-name -> URL-prefix overrides. The value may be an object
 * or a JSON string (as it arrives from the environment).
 */
export function blueprintUrlPrefixes(config: AppConfig): Record<string, string> {
  const raw = config.get(BLUEPRINTS_URL_PREFIXES);
  if (raw === undefined) return {};

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new BlueprintError(
        `${BLUEPRINTS_URL_PREFIXES} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const result = UrlPrefixesSchema.safeParse(value);
  if (!result.success) {
    throw new BlueprintError(`${BLUEPRINTS_URL_PREFIXES} must map blueprint names to strings`);
  }
  return result.data;
}

/**
 * Join a URL prefix and a route path into one absolute path.
 */
export function joinPaths(prefix: string, path: string): string {
  const head = prefix.replace(/\/+$/, '');
  const tail = path.startsWith('/') ? path : `/${path}`;
  const joined = `${head}${tail}`;
  return joined.startsWith('/') ? joined : `/${joined}`;
}
