import { describe, expect, it } from 'vitest';
import { domainOf, fallbackImage, fallbackText, NO_SNIPPET_TEXT } from '../fallbacks';

const imageOptions = {
  logoUrlTemplate: 'https://logo.example.com/{domain}',
  faviconUrlTemplate: 'https://favicons.example.com/{domain}.ico',
  placeholderImageUrl: 'https://placeholder.example.com/600x400',
};

describe('fallbackText', () => {
  it('uses the headline with a trailing marker', () => {
    expect(fallbackText('Local bakery wins award')).toBe('Local bakery wins award...');
  });

  it('cuts long headlines', () => {
    expect(fallbackText('abcdefghij', 4)).toBe('abcd...');
  });

  it('keeps emoji whole when cutting', () => {
    expect(fallbackText('ab\u{1F600}cd', 3)).toBe('ab...');
  });

  it('reports missing headlines', () => {
    expect(fallbackText(null)).toBe(NO_SNIPPET_TEXT);
    expect(fallbackText('  ')).toBe(NO_SNIPPET_TEXT);
    expect(fallbackText('None')).toBe(NO_SNIPPET_TEXT);
  });
});

describe('domainOf', () => {
  it('strips www and lowercases', () => {
    expect(domainOf('https://WWW.Example.com/path')).toBe('example.com');
  });

  it('returns null for invalid URLs', () => {
    expect(domainOf('not a url')).toBeNull();
  });
});

describe('fallbackImage', () => {
  it('uses the logo for the article domain', () => {
    expect(fallbackImage('https://www.news.example.com/story', imageOptions)).toBe(
      'https://logo.example.com/news.example.com',
    );
  });

  it('uses the favicon when no logo template is set', () => {
    expect(fallbackImage('https://news.example.com/story', { ...imageOptions, logoUrlTemplate: '' })).toBe(
      'https://favicons.example.com/news.example.com.ico',
    );
  });

  it('ends at the placeholder', () => {
    expect(fallbackImage('not a url', imageOptions)).toBe('https://placeholder.example.com/600x400');
    expect(
      fallbackImage('https://news.example.com/story', { ...imageOptions, logoUrlTemplate: '', faviconUrlTemplate: '' }),
    ).toBe('https://placeholder.example.com/600x400');
  });
});
