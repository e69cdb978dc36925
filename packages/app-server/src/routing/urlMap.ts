/**
 * URL Map
 *
 * Reverse routing: endpoint name + parameter values -> relative path.
 * Patterns use the Express syntax (`/records/:id`, `/pages/:page?`) and are
 * compiled with path-to-regexp. Rules carry no request handlers; dispatching
 * stays with Express.
 */

import { compile, parse, type Key, type PathFunction } from 'path-to-regexp';
import { AppError, BuildError, type UrlValues } from '../errors.js';

export interface RuleOptions {
  endpoint: string;
  /** Accepted HTTP methods; omitted means any method */
  methods?: readonly string[];
}

export class Rule {
  readonly path: string;
  readonly endpoint: string;
  readonly methods: ReadonlySet<string> | null;
  /** Every named parameter of the pattern */
  readonly arguments: readonly string[];
  /** Parameters without an optional or zero-or-more modifier */
  readonly requiredArguments: readonly string[];
  private readonly toPath: PathFunction<Record<string, string>>;

  constructor(path: string, options: RuleOptions) {
    this.path = path;
    this.endpoint = options.endpoint;

    if (options.methods && options.methods.length > 0) {
      const methods = new Set(options.methods.map((m) => m.toUpperCase()));
      if (methods.has('GET')) methods.add('HEAD');
      this.methods = methods;
    } else {
      this.methods = null;
    }

    const keys = parse(path).filter((token): token is Key => typeof token !== 'string');
    this.arguments = keys.map((key) => String(key.name));
    this.requiredArguments = keys
      .filter((key) => key.modifier !== '?' && key.modifier !== '*')
      .map((key) => String(key.name));
    this.toPath = compile<Record<string, string>>(path, { encode: encodeURIComponent });
  }

  acceptsMethod(method?: string): boolean {
    return !method || !this.methods || this.methods.has(method.toUpperCase());
  }

  suitableFor(values: UrlValues, method?: string): boolean {
    return (
      this.acceptsMethod(method) &&
      this.requiredArguments.every((name) => values[name] !== undefined)
    );
  }

  /**
   * Build the path for these values. Values the pattern does not consume are
   * appended as a query string. Throws a TypeError when a value does not
   * satisfy its parameter pattern.
   */
  build(values: UrlValues): string {
    const params: Record<string, string> = {};
    const query = new URLSearchParams();

    for (const [name, value] of Object.entries(values)) {
      if (value === undefined) continue;
      if (this.arguments.includes(name)) {
        params[name] = String(value);
      } else {
        query.append(name, String(value));
      }
    }

    const path = this.toPath(params);
    const search = query.toString();
    return search ? `${path}?${search}` : path;
  }
}

export class UrlMap {
  private readonly rules: Rule[] = [];
  /** Per endpoint, ordered for building: more arguments first, then insertion order */
  private readonly buildRules = new Map<string, Rule[]>();
  private isFrozen = false;

  constructor(rules: Iterable<Rule> = []) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  add(rule: Rule): void {
    if (this.isFrozen) {
      throw new AppError(`Cannot add rule '${rule.path}' to a frozen url map`, 500, 'URL_MAP_FROZEN');
    }
    this.rules.push(rule);

    const forEndpoint = this.buildRules.get(rule.endpoint) ?? [];
    forEndpoint.push(rule);
    forEndpoint.sort((a, b) => b.arguments.length - a.arguments.length);
    this.buildRules.set(rule.endpoint, forEndpoint);
  }

  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  has(endpoint: string): boolean {
    return this.buildRules.has(endpoint);
  }

  iterRules(endpoint?: string): Rule[] {
    return endpoint === undefined
      ? [...this.rules]
      : this.rules.filter((rule) => rule.endpoint === endpoint);
  }

  /**
   * Build the relative path of an endpoint with the first suitable rule.
   * Without a method, rules accepting GET are tried before the others.
   */
  build(endpoint: string, values: UrlValues = {}, method?: string): string {
    const rules = this.buildRules.get(endpoint);
    if (!rules) {
      throw new BuildError(endpoint, values, method);
    }

    const path = method === undefined
      ? buildWithFirst(rules, values, DEFAULT_METHOD) ?? buildWithFirst(rules, values)
      : buildWithFirst(rules, values, method);
    if (path === null) {
      throw new BuildError(endpoint, values, method, explainFailure(rules, values, method));
    }
    return path;
  }
}

const DEFAULT_METHOD = 'GET';

function buildWithFirst(rules: Rule[], values: UrlValues, method?: string): string | null {
  for (const rule of rules) {
    if (!rule.suitableFor(values, method)) continue;
    try {
      return rule.build(values);
    } catch (err) {
      // path-to-regexp rejects values that do not match the parameter pattern
      if (!(err instanceof TypeError)) throw err;
    }
  }
  return null;
}

function explainFailure(rules: Rule[], values: UrlValues, method?: string): string {
  const candidates = rules.filter((rule) => rule.acceptsMethod(method));
  if (candidates.length === 0) {
    return `No rule accepts the '${method?.toUpperCase()}' method.`;
  }

  const missing = candidates[0].requiredArguments.filter((name) => values[name] === undefined);
  if (missing.length > 0) {
    return `Did you forget to specify values [${missing.map((name) => `'${name}'`).join(', ')}]?`;
  }
  return 'The given values do not match any rule.';
}
