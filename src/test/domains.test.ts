import { describe, expect, it } from 'vitest';
import {
  primaryDomain,
  primaryDomainOfUrl,
  sortWorkItems,
} from '../lib/batch/domains.js';

describe('primaryDomain', () => {
  it('collapses hosts ending in the suffix', () => {
    expect(primaryDomain('a.asimov.academy')).toBe('asimov.academy');
    expect(primaryDomain('hub.b.asimov.academy')).toBe('asimov.academy');
    expect(primaryDomain('asimov.academy')).toBe('asimov.academy');
  });

  it('leaves other hosts unchanged', () => {
    expect(primaryDomain('other.com')).toBe('other.com');
    expect(primaryDomain('asimov.academy.evil.com')).toBe('asimov.academy.evil.com');
    expect(primaryDomain('localhost:3000')).toBe('localhost:3000');
  });

  it('is idempotent', () => {
    for (const host of ['a.asimov.academy', 'other.com', 'docs.acme.io']) {
      expect(primaryDomain(primaryDomain(host))).toBe(primaryDomain(host));
      expect(primaryDomain(primaryDomain(host, 'acme.io'), 'acme.io')).toBe(
        primaryDomain(host, 'acme.io'),
      );
    }
  });

  it('accepts a custom suffix', () => {
    expect(primaryDomain('docs.acme.io', 'acme.io')).toBe('acme.io');
    expect(primaryDomain('a.asimov.academy', 'acme.io')).toBe('a.asimov.academy');
  });
});

describe('primaryDomainOfUrl', () => {
  it('uses the host, port included', () => {
    expect(primaryDomainOfUrl('https://b.asimov.academy/y?q=1')).toBe('asimov.academy');
    expect(primaryDomainOfUrl('http://localhost:8080/a')).toBe('localhost:8080');
  });
});

describe('sortWorkItems', () => {
  it('sorts by primary domain, then by url', () => {
    expect(
      sortWorkItems([
        'https://other.com/z',
        'https://b.asimov.academy/y',
        'https://a.asimov.academy/x',
        'https://asimov.academy/',
      ]),
    ).toEqual([
      'https://a.asimov.academy/x',
      'https://asimov.academy/',
      'https://b.asimov.academy/y',
      'https://other.com/z',
    ]);
  });

  it('does not modify its input', () => {
    const urls = ['https://b.com/', 'https://a.com/'];
    sortWorkItems(urls);
    expect(urls).toEqual(['https://b.com/', 'https://a.com/']);
  });
});
