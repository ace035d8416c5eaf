import { describe, expect, it } from 'vitest';
import { ExemptDomainMatcher, isExempt, normalizeDomain, parseDomainPatterns } from './domain';

describe('normalizeDomain', () => {
  it.each([
    ['example.com', 'example.com'],
    ['Example.COM', 'example.com'],
    ['www.example.com', 'example.com'],
    ['https://WWW.Example.com:8443/wp-admin?x=1', 'example.com'],
    ['http://shop.example.com/', 'shop.example.com'],
    ['example.com.', 'example.com'],
    ['  example.com  ', 'example.com'],
    ['localhost:8080', 'localhost'],
  ])('%j -> %j', (input, expected) => {
    expect(normalizeDomain(input)).toBe(expected);
  });

  it('only strips a leading www label', () => {
    expect(normalizeDomain('wwwexample.com')).toBe('wwwexample.com');
    expect(normalizeDomain('shop.www.example.com')).toBe('shop.www.example.com');
  });

  it.each(['', '   ', 'exa mple.com', 'http://', 'a'.repeat(300) + '.com'])('rejects %j', (input) => {
    expect(normalizeDomain(input)).toBeNull();
  });

  it('makes equal domains byte-equal', () => {
    expect(normalizeDomain('https://www.Shop.Example.com/')).toBe(normalizeDomain('shop.example.com.'));
  });
});

describe('parseDomainPatterns', () => {
  it('splits on newlines and commas', () => {
    expect(parseDomainPatterns('a.com, b.com\nC.com.\r\n\n')).toEqual(['a.com', 'b.com', 'c.com']);
  });
});

describe('isExempt', () => {
  it('matches the pattern itself and strict subdomains', () => {
    expect(isExempt('myapp.local', ['myapp.local'])).toBe(true);
    expect(isExempt('dev.myapp.local', ['myapp.local'])).toBe(true);
    expect(isExempt('notmyapp.local', ['myapp.local'])).toBe(false);
  });

  it('matches wildcard patterns against strict subdomains only', () => {
    expect(isExempt('site.test', ['*.test'])).toBe(true);
    expect(isExempt('a.b.test', ['*.test'])).toBe(true);
    expect(isExempt('test', ['*.test'])).toBe(false);
    expect(isExempt('sitetest', ['*.test'])).toBe(false);
  });

  it('normalizes the candidate first', () => {
    expect(isExempt('https://www.Staging.Example.com/', ['staging.example.com'])).toBe(true);
  });

  it('matches nothing with no patterns', () => {
    expect(isExempt('example.com', [])).toBe(false);
  });
});

describe('ExemptDomainMatcher', () => {
  it('always includes the built-in developer domains', () => {
    const matcher = new ExemptDomainMatcher();

    expect(matcher.matches('localhost')).toBe(true);
    expect(matcher.matches('http://localhost:8080')).toBe(true);
    expect(matcher.matches('shop.local')).toBe(true);
    expect(matcher.matches('shop.test')).toBe(true);
    expect(matcher.matches('shop.example.com')).toBe(false);
  });

  it('adds configured patterns to the built-ins', () => {
    const matcher = new ExemptDomainMatcher('staging.example.com,\n*.dev.example.org');

    expect(matcher.patterns).toEqual(['localhost', '*.local', '*.test', 'staging.example.com', '*.dev.example.org']);
    expect(matcher.matches('eu.staging.example.com')).toBe(true);
    expect(matcher.matches('feature.dev.example.org')).toBe(true);
    expect(matcher.matches('dev.example.org')).toBe(false);
    expect(matcher.matches('example.com')).toBe(false);
  });
});
