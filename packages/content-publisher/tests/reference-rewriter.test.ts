import { describe, it, expect, beforeEach } from 'vitest';
import path from 'path';
import { promises as fs } from 'fs';
import { remove } from 'fs-extra/esm';
import { Logger } from 'shared';
import {
  ReferenceRewriter,
  absolutizeEntryReferences,
  substituteReferences,
} from '../src/reference-rewriter.js';
import { TEST_SITE_URL, writeContentDir } from './helpers.js';

const TEST_DIR = path.join(process.cwd(), 'test-output', 'reference-rewriter');
const BASE = `${TEST_SITE_URL}/article/42`;

describe('substituteReferences', () => {
  it('should replace every literal occurrence', () => {
    const map = new Map([['media/pic.jpg', 'https://cdn.test/images/originals/1.jpg']]);
    expect(substituteReferences('<img src="media/pic.jpg"><a href="media/pic.jpg">', map)).toBe(
      '<img src="https://cdn.test/images/originals/1.jpg"><a href="https://cdn.test/images/originals/1.jpg">'
    );
  });

  it('should treat keys as literal text', () => {
    const map = new Map([['media/a+(1).jpg', 'https://cdn.test/2.jpg']]);
    expect(substituteReferences('url(media/a+(1).jpg) media/a1.jpg', map)).toBe('url(https://cdn.test/2.jpg) media/a1.jpg');
  });

  it('should prefer the longest key', () => {
    const map = new Map([
      ['media/a.jpg', 'https://cdn.test/short.jpg'],
      ['media/a.jpg.webp', 'https://cdn.test/long.webp'],
    ]);
    expect(substituteReferences('media/a.jpg.webp media/a.jpg', map)).toBe(
      'https://cdn.test/long.webp https://cdn.test/short.jpg'
    );
  });
});

describe('absolutizeEntryReferences', () => {
  it('should root relative stylesheet and script references at the canonical base', () => {
    const markup = [
      '<link rel="stylesheet" href="style.css">',
      "<link rel='stylesheet' href='./css/theme.css'>",
      '<script src="./app.js"></script>',
      "<script src='js/vendor.js'></script>",
    ].join('\n');

    expect(absolutizeEntryReferences(markup, BASE)).toBe(
      [
        `<link rel="stylesheet" href="${BASE}/style.css">`,
        `<link rel='stylesheet' href='${BASE}/css/theme.css'>`,
        `<script src="${BASE}/app.js"></script>`,
        `<script src='${BASE}/js/vendor.js'></script>`,
      ].join('\n')
    );
  });

  it('should keep the attribute name as written', () => {
    const markup = '<LINK REL="stylesheet" HREF="style.css"><SCRIPT Src="app.js"></SCRIPT>';

    expect(absolutizeEntryReferences(markup, BASE)).toBe(
      `<LINK REL="stylesheet" HREF="${BASE}/style.css"><SCRIPT Src="${BASE}/app.js"></SCRIPT>`
    );
  });

  it('should leave absolute and root-relative references alone', () => {
    const markup = [
      '<link href="https://fonts.example.test/font.css">',
      '<script src="//cdn.example.test/lib.js"></script>',
      '<script src="/static/site.js"></script>',
      '<img src="media/pic.jpg">',
    ].join('\n');

    expect(absolutizeEntryReferences(markup, BASE)).toBe(markup);
  });
});

describe('ReferenceRewriter', () => {
  const rewriter = new ReferenceRewriter(TEST_SITE_URL, new Logger());
  const mediaMap = new Map([['media/pic.jpg', 'https://cdn.test/images/originals/9.jpg']]);
  const markup = '<link href="style.css"><img src="media/pic.jpg"><script src="app.js"></script>';

  beforeEach(async () => {
    await remove(TEST_DIR);
    await writeContentDir(TEST_DIR, {
      'index.html': markup,
      'style.css': '.hero { background: url(media/pic.jpg); }',
      'app.js': 'console.log("static");',
      'notes/about.html': '<p>no references</p>',
    });
  });

  it('should not touch drafts', async () => {
    const rewritten = await rewriter.rewrite({ contentDir: TEST_DIR, mediaMap, contentId: 42, kind: 'article', published: false });

    expect(rewritten).toEqual([]);
    await expect(fs.readFile(path.join(TEST_DIR, 'index.html'), 'utf-8')).resolves.toBe(markup);
  });

  it('should rewrite published markup, styles and scripts in place', async () => {
    const rewritten = await rewriter.rewrite({ contentDir: TEST_DIR, mediaMap, contentId: 42, kind: 'article', published: true });

    expect(rewritten).toEqual(['index.html', 'style.css']);
    await expect(fs.readFile(path.join(TEST_DIR, 'index.html'), 'utf-8')).resolves.toBe(
      `<link href="${BASE}/style.css"><img src="https://cdn.test/images/originals/9.jpg"><script src="${BASE}/app.js"></script>`
    );
    await expect(fs.readFile(path.join(TEST_DIR, 'style.css'), 'utf-8')).resolves.toBe(
      '.hero { background: url(https://cdn.test/images/originals/9.jpg); }'
    );
  });

  it('should not write files without substitutions', async () => {
    const untouched = path.join(TEST_DIR, 'notes', 'about.html');
    const past = new Date('2020-01-01T00:00:00.000Z');
    await fs.utimes(untouched, past, past);

    await rewriter.rewrite({ contentDir: TEST_DIR, mediaMap, contentId: 42, kind: 'article', published: true });

    const stats = await fs.stat(untouched);
    expect(stats.mtime.getTime()).toBe(past.getTime());
  });

  it('should only absolutize the entry markup', async () => {
    await writeContentDir(TEST_DIR, { 'notes/about.html': '<link href="local.css">' });

    const rewritten = await rewriter.rewrite({ contentDir: TEST_DIR, mediaMap, contentId: 42, kind: 'article', published: true });

    expect(rewritten).not.toContain('notes/about.html');
    await expect(fs.readFile(path.join(TEST_DIR, 'notes', 'about.html'), 'utf-8')).resolves.toBe('<link href="local.css">');
  });
});
