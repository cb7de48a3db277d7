import { describe, expect, it } from '@jest/globals';
import { ConfigurationError } from '../errors.js';
import { audienceMatches, isSecureEndpoint, normalizeResourceUrl, resourceMatches } from './resource-url.js';

describe('resource-url', () => {
  describe('normalizeResourceUrl', () => {
    it('lower-cases scheme and host and drops the trailing slash', () => {
      expect(normalizeResourceUrl('HTTPS://API.Example.com/v1/')).toBe('https://api.example.com/v1');
    });

    it('drops the fragment and keeps the query', () => {
      expect(normalizeResourceUrl('https://api.example.com/mcp?tenant=a#section')).toBe('https://api.example.com/mcp?tenant=a');
    });

    it('keeps an explicit port', () => {
      expect(normalizeResourceUrl('http://localhost:8080/')).toBe('http://localhost:8080');
    });

    it('rejects values that are not URLs', () => {
      expect(() => normalizeResourceUrl('not a url')).toThrow(ConfigurationError);
    });
  });

  describe('isSecureEndpoint', () => {
    it.each([
      ['https://auth.example.com/introspect', true],
      ['http://localhost:9000/introspect', true],
      ['http://127.0.0.1/introspect', true],
      ['http://[::1]:9000/introspect', true],
      ['http://auth.example.com/introspect', false],
      ['ftp://auth.example.com', false],
      ['nonsense', false],
    ])('%s -> %s', (url, expected) => {
      expect(isSecureEndpoint(url)).toBe(expected);
    });
  });

  describe('resourceMatches', () => {
    it('accepts an audience that is a path-prefix parent of the server resource', () => {
      expect(resourceMatches('https://api.example.com', 'https://api.example.com/v1/users')).toBe(true);
    });

    it('accepts an exact match regardless of trailing slash', () => {
      expect(resourceMatches('https://api.example.com/v1/', 'https://api.example.com/v1')).toBe(true);
    });

    it('rejects another origin', () => {
      expect(resourceMatches('https://api.example.com', 'https://other.com')).toBe(false);
    });

    it('rejects a sibling path that only shares a prefix string', () => {
      expect(resourceMatches('https://api.example.com/v1', 'https://api.example.com/v10')).toBe(false);
    });

    it('rejects a child audience for a parent resource', () => {
      expect(resourceMatches('https://api.example.com/v1/users', 'https://api.example.com/v1')).toBe(false);
    });

    it('returns false for unparseable input', () => {
      expect(resourceMatches('::', 'https://api.example.com')).toBe(false);
    });
  });

  describe('audienceMatches', () => {
    it('matches when any audience entry matches', () => {
      expect(audienceMatches(['https://a.example.com', 'https://api.example.com'], 'https://api.example.com/v1')).toBe(true);
    });

    it('does not match without an audience', () => {
      expect(audienceMatches(undefined, 'https://api.example.com')).toBe(false);
    });
  });
});
