import { load } from 'cheerio';
import { describe, expect, it } from 'vitest';
import { collectImageCandidates, extractContent, extractImage, extractSnippet } from '../extractor';

const BASE_URL = 'https://news.example.com/world/story';

describe('extractSnippet', () => {
  it('prefers the first non-empty paragraph inside an article container', () => {
    const html = `
      <body>
        <p>Subscribe to our newsletter</p>
        <article>
          <p>   </p>
          <p>Lead   paragraph
            of the story.</p>
          <p>Second paragraph.</p>
        </article>
      </body>`;

    expect(extractSnippet(html, { maxLength: 500 })).toBe('Lead paragraph of the story.');
  });

  it('takes containers in document order', () => {
    const html = `
      <div class="entry-content"><p>From the entry body.</p></div>
      <article><p>From the article tag.</p></article>`;

    expect(extractSnippet(html, { maxLength: 500 })).toBe('From the entry body.');
  });

  it('falls back to any paragraph on the page', () => {
    expect(extractSnippet('<main><div><p>Only paragraph.</p></div></main>', { maxLength: 500 })).toBe(
      'Only paragraph.',
    );
  });

  it('returns null when the page has no paragraph text', () => {
    expect(extractSnippet('<div>No paragraphs here</div>', { maxLength: 500 })).toBeNull();
  });

  it('truncates to the requested length', () => {
    const html = `<article><p>${'word '.repeat(10)}</p></article>`;
    const snippet = extractSnippet(html, { maxLength: 20 });

    expect(snippet).toBe('word word word wo...');
  });
});

describe('extractImage', () => {
  it('resolves a relative og:image against the page URL', () => {
    const html = '<head><meta property="og:image" content="/images/hero.jpg"></head><body></body>';
    expect(extractImage(html, BASE_URL)).toBe('https://news.example.com/images/hero.jpg');
  });

  it('reads twitter:image from a name attribute', () => {
    const html = '<head><meta name="twitter:image" content="https://cdn.example.com/card.jpg"></head>';
    expect(extractImage(html, BASE_URL)).toBe('https://cdn.example.com/card.jpg');
  });

  it('skips rejected candidates and uses the next one', () => {
    const html = `
      <head><meta property="og:image" content="https://cdn.example.com/logo.png"></head>
      <body><article><img src="https://cdn.example.com/photo.jpg"></article></body>`;

    expect(extractImage(html, BASE_URL)).toBe('https://cdn.example.com/photo.jpg');
  });

  it('reads lazy-loaded data-src images', () => {
    expect(extractImage('<div><img data-src="https://cdn.example.com/lazy.jpg"></div>', BASE_URL)).toBe(
      'https://cdn.example.com/lazy.jpg',
    );
  });

  it.each([
    'data:image/png;base64,iVBORw0KGgo=',
    '',
    '/static/grey-placeholder.jpg',
  ])('prefers data-src over a placeholder src of %j', (placeholder) => {
    const html = `<article><img src="${placeholder}" data-src="/media/story-photo.jpg"></article>`;
    expect(extractImage(html, 'https://news.example.com/a')).toBe('https://news.example.com/media/story-photo.jpg');
  });

  it('uses src when the data-src image is rejected', () => {
    const html =
      '<article><img src="https://cdn.example.com/photo.jpg" data-src="https://cdn.example.com/spacer.png"></article>';
    expect(extractImage(html, BASE_URL)).toBe('https://cdn.example.com/photo.jpg');
  });

  it('returns null when no candidate passes validation', () => {
    const html = '<img src="https://cdn.example.com/banner.gif"><img src="data:image/png;base64,AAAA">';
    expect(extractImage(html, BASE_URL)).toBeNull();
  });
});

describe('collectImageCandidates', () => {
  it('orders meta images before container images before the rest and drops duplicates', () => {
    const $ = load(`
      <head><meta property="og:image" content="https://cdn.example.com/a.jpg"></head>
      <body>
        <img src="https://cdn.example.com/c.jpg">
        <article><img src="https://cdn.example.com/b.jpg"><img src="https://cdn.example.com/a.jpg"></article>
      </body>`);

    expect(collectImageCandidates($, BASE_URL)).toEqual([
      'https://cdn.example.com/a.jpg',
      'https://cdn.example.com/b.jpg',
      'https://cdn.example.com/c.jpg',
    ]);
  });
});

describe('extractContent', () => {
  it('runs only the requested extractions', () => {
    const html = '<article><p>Body text.</p><img src="https://cdn.example.com/photo.jpg"></article>';

    expect(extractContent(html, BASE_URL, { text: false, image: true }, { maxLength: 500 })).toEqual({
      text: null,
      image: 'https://cdn.example.com/photo.jpg',
    });
    expect(extractContent(html, BASE_URL, { text: true, image: false }, { maxLength: 500 })).toEqual({
      text: 'Body text.',
      image: null,
    });
  });
});
