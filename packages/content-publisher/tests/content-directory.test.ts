import { describe, it, expect, beforeAll } from 'vitest';
import path from 'path';
import { remove } from 'fs-extra/esm';
import { classify, extensionOf, listFiles, listImages, listStaticAssets } from '../src/content-directory.js';
import { writeContentDir } from './helpers.js';

const TEST_DIR = path.join(process.cwd(), 'test-output', 'content-directory');

describe('classify', () => {
  it('should classify by extension regardless of case', () => {
    expect(classify('media/pic.JPG')).toBe('image');
    expect(classify('media/photo.heic')).toBe('image');
    expect(classify('reels/clip.MOV')).toBe('video');
    expect(classify('index.html')).toBe('static');
    expect(classify('css/site.css')).toBe('static');
    expect(classify('app.js')).toBe('static');
    expect(classify('notes.pdf')).toBe('unsupported');
    expect(classify('README')).toBe('unsupported');
  });

  it('should lower-case extensions', () => {
    expect(extensionOf('media/Pic.JPEG')).toBe('.jpeg');
    expect(extensionOf('Makefile')).toBe('');
  });
});

describe('content directory listing', () => {
  beforeAll(async () => {
    await remove(TEST_DIR);
    await writeContentDir(TEST_DIR, {
      'metadata.txt': 'title=x',
      'index.html': '<html></html>',
      'css/site.css': 'body {}',
      'js/app.js': '',
      'media/b.png': 'png',
      'media/a.jpg': 'jpg',
      'media/nested/c.gif': 'gif',
      'thumbnail/z.png': 'png',
      'thumbnail/a.jpg': 'jpg',
      'thumbnail/notes.txt': 'text',
      'thumbnail/old/first.jpg': 'jpg',
    });
  });

  it('should list files recursively in sorted order', async () => {
    const files = await listFiles(TEST_DIR, 'media');
    expect(files.map(file => file.relativePath)).toEqual(['media/a.jpg', 'media/b.png', 'media/nested/c.gif']);
    expect(files[0]?.absolutePath).toBe(path.join(TEST_DIR, 'media', 'a.jpg'));
  });

  it('should return nothing for a missing subdirectory', async () => {
    await expect(listFiles(TEST_DIR, 'reels')).resolves.toEqual([]);
  });

  it('should list static assets without the metadata file', async () => {
    const files = await listStaticAssets(TEST_DIR);
    expect(files.map(file => file.relativePath)).toEqual(['css/site.css', 'index.html', 'js/app.js']);
  });

  it('should list only images directly inside a subdirectory', async () => {
    const files = await listImages(TEST_DIR, 'thumbnail');
    expect(files.map(file => file.relativePath)).toEqual(['thumbnail/a.jpg', 'thumbnail/z.png']);
  });
});
