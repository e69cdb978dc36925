/**
 * UrlMap Tests
 * Reverse building of endpoint + values into relative paths
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Rule, UrlMap } from '../routing/urlMap.js';
import { AppError, BuildError } from '../errors.js';

describe('Rule', () => {
  it('should collect named and required arguments', () => {
    const rule = new Rule('/records/:id/files/:name?', { endpoint: 'records.files' });

    expect(rule.arguments).toEqual(['id', 'name']);
    expect(rule.requiredArguments).toEqual(['id']);
  });

  it('should accept HEAD wherever GET is accepted', () => {
    const rule = new Rule('/records', { endpoint: 'records.list', methods: ['get'] });

    expect(rule.methods).toEqual(new Set(['GET', 'HEAD']));
    expect(rule.acceptsMethod('head')).toBe(true);
    expect(rule.acceptsMethod('POST')).toBe(false);
  });

  it('should accept any method when none are declared', () => {
    const rule = new Rule('/hooks', { endpoint: 'hooks.receive' });

    expect(rule.methods).toBeNull();
    expect(rule.acceptsMethod('DELETE')).toBe(true);
  });

  it('should encode parameter values', () => {
    const rule = new Rule('/records/:id', { endpoint: 'records.detail' });

    expect(rule.build({ id: 'a b/c' })).toBe('/records/a%20b%2Fc');
  });

  it('should append unused values as a query string in insertion order', () => {
    const rule = new Rule('/records/:id', { endpoint: 'records.detail' });

    expect(rule.build({ id: '7', page: 2, q: 'x y' })).toBe('/records/7?page=2&q=x+y');
  });

  it('should drop undefined values', () => {
    const rule = new Rule('/records/:id', { endpoint: 'records.detail' });

    expect(rule.build({ id: '7', page: undefined })).toBe('/records/7');
  });

  it('should omit an optional parameter without a value', () => {
    const rule = new Rule('/pages/:page?', { endpoint: 'pages.index' });

    expect(rule.build({})).toBe('/pages');
    expect(rule.build({ page: 3 })).toBe('/pages/3');
  });

  it('should not hold a request handler', () => {
    const rule = new Rule('/records/:id', { endpoint: 'records.detail' });

    expect('handler' in rule).toBe(false);
  });
});

describe('UrlMap', () => {
  let urlMap: UrlMap;

  beforeEach(() => {
    urlMap = new UrlMap([
      new Rule('/records/:id', { endpoint: 'records.detail', methods: ['GET'] }),
      new Rule('/records', { endpoint: 'records.list', methods: ['GET'] }),
      new Rule('/records', { endpoint: 'records.create', methods: ['POST'] }),
      new Rule('/search', { endpoint: 'search.results', methods: ['GET'] }),
      new Rule('/search/:term', { endpoint: 'search.results', methods: ['GET'] }),
      new Rule('/items/:id(\\d+)', { endpoint: 'items.detail', methods: ['GET'] }),
    ]);
  });

  describe('build', () => {
    it('should build a path from endpoint and values', () => {
      expect(urlMap.build('records.detail', { id: 'abc123' })).toBe('/records/abc123');
    });

    it('should prefer the rule consuming more arguments', () => {
      expect(urlMap.build('search.results', { term: 'cats' })).toBe('/search/cats');
    });

    it('should fall back to a rule whose arguments are all given', () => {
      expect(urlMap.build('search.results', {})).toBe('/search');
    });

    it('should prefer GET rules when no method is given', () => {
      const mixed = new UrlMap([
        new Rule('/items/:id/:rev', { endpoint: 'items.save', methods: ['PUT'] }),
        new Rule('/items/:id', { endpoint: 'items.save', methods: ['GET'] }),
      ]);

      expect(mixed.build('items.save', { id: 1, rev: 2 })).toBe('/items/1?rev=2');
      expect(mixed.build('items.save', { id: 1, rev: 2 }, 'PUT')).toBe('/items/1/2');
    });

    it('should fall back to any method when no GET rule fits', () => {
      expect(urlMap.build('records.create', {})).toBe('/records');
    });

    it('should filter rules by method', () => {
      expect(urlMap.build('records.create', {}, 'post')).toBe('/records');
      expect(urlMap.build('records.list', {}, 'HEAD')).toBe('/records');
    });

    it('should throw BuildError for an unknown endpoint', () => {
      expect(() => urlMap.build('nonexistent.page', {})).toThrow(BuildError);
      expect(() => urlMap.build('nonexistent.page', {})).toThrow(
        "Could not build url for endpoint 'nonexistent.page'.",
      );
    });

    it('should name the missing values', () => {
      expect(() => urlMap.build('records.detail', {})).toThrow(
        "Could not build url for endpoint 'records.detail'. Did you forget to specify values ['id']?",
      );
    });

    it('should name a method no rule accepts', () => {
      expect(() => urlMap.build('records.create', {}, 'GET')).toThrow(
        "Could not build url for endpoint 'records.create'. No rule accepts the 'GET' method.",
      );
    });

    it('should reject values that do not match the parameter pattern', () => {
      expect(urlMap.build('items.detail', { id: 42 })).toBe('/items/42');
      expect(() => urlMap.build('items.detail', { id: 'abc' })).toThrow(
        "Could not build url for endpoint 'items.detail'. The given values do not match any rule.",
      );
    });

    it('should carry endpoint, values and method on the error', () => {
      let caught: unknown;
      try {
        urlMap.build('records.detail', { page: 1 }, 'GET');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(BuildError);
      expect(caught).toMatchObject({
        name: 'BuildError',
        endpoint: 'records.detail',
        values: { page: 1 },
        method: 'GET',
        statusCode: 500,
        code: 'BUILD_ERROR',
      });
    });
  });

  describe('rules', () => {
    it('should list rules in insertion order', () => {
      expect(urlMap.iterRules().map((rule) => rule.path)).toEqual([
        '/records/:id',
        '/records',
        '/records',
        '/search',
        '/search/:term',
        '/items/:id(\\d+)',
      ]);
    });

    it('should list the rules of one endpoint', () => {
      expect(urlMap.iterRules('search.results').map((rule) => rule.path)).toEqual(['/search', '/search/:term']);
    });

    it('should report known endpoints', () => {
      expect(urlMap.has('records.list')).toBe(true);
      expect(urlMap.has('records.delete')).toBe(false);
    });
  });

  describe('freeze', () => {
    it('should reject new rules once frozen', () => {
      urlMap.freeze();

      expect(urlMap.frozen).toBe(true);
      expect(() => urlMap.add(new Rule('/late', { endpoint: 'late.rule' }))).toThrow(AppError);
      expect(urlMap.has('late.rule')).toBe(false);
    });

    it('should still build once frozen', () => {
      expect(urlMap.freeze().build('records.detail', { id: '1' })).toBe('/records/1');
    });
  });
});
