import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import path from 'path';
import { promises as fs } from 'fs';
import request from 'supertest';
import type express from 'express';
import { ensureDir, remove } from 'fs-extra/esm';
import { applySchema, contentBlocks, Logger, withDatabase } from 'shared';
import type { PublishCollaborators } from 'content-publisher';
import PublishServer from '../src/server.js';
import { contentPathOf, requestedStatusOf } from '../src/handlers.js';

const root = path.join(process.cwd(), 'test-output', 'publish-server');
const dbPath = path.join(root, 'content.db');
const sourceRoot = path.join(root, 'source');

const testEnv = {
  DB_PATH: dbPath,
  STORAGE_ROOT: path.join(root, 'storage'),
  STAGING_ROOT: path.join(root, 'staging'),
  MEDIA_PUBLIC_URL: 'https://cdn.example.test/bucket',
  MEDIA_BUCKET_DIR: path.join(root, 'bucket'),
  SITE_URL: 'https://site.example.test',
  NODE_ENV: 'test',
};

async function writeDirectory(name: string, files: Record<string, string>): Promise<string> {
  const dir = path.join(sourceRoot, name);
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(dir, relativePath);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, content, 'utf-8');
  }
  return dir;
}

function countBlocks(): Promise<number> {
  return withDatabase(dbPath, db => db.select().from(contentBlocks).all().length);
}

describe('request helpers', () => {
  const base = { method: 'POST', path: '/publish', headers: {}, query_params: {}, body: '' };

  it('should prefer the path query parameter over the body', () => {
    expect(contentPathOf({ ...base, query_params: { path: ' /srv/a ' }, body: '/srv/b' })).toBe('/srv/a');
    expect(contentPathOf({ ...base, body: '  /srv/b\n' })).toBe('/srv/b');
  });

  it('should map status=1 to published and any other value to draft', () => {
    expect(requestedStatusOf({ ...base, query_params: { status: '1' } })).toBe('published');
    expect(requestedStatusOf({ ...base, query_params: { status: '0' } })).toBe('draft');
    expect(requestedStatusOf({ ...base, query_params: { status: '' } })).toBe('draft');
  });

  it('should leave the status to the metadata when the parameter is absent', () => {
    expect(requestedStatusOf(base)).toBeUndefined();
  });
});

describe('PublishServer', () => {
  let app: express.Application;
  let upload: Mock<(localPath: string, remoteKey: string) => Promise<string>>;

  beforeEach(async () => {
    await remove(root);
    await Promise.all([ensureDir(testEnv.STORAGE_ROOT), ensureDir(testEnv.STAGING_ROOT), ensureDir(sourceRoot)]);
    await applySchema(dbPath);

    upload = vi.fn(async (_localPath: string, remoteKey: string) => `${testEnv.MEDIA_PUBLIC_URL}/${remoteKey}`);
    const collaborators: PublishCollaborators = {
      uploader: { upload },
      imageProber: { probeImage: async () => ({ width: 800, height: 600, mimeType: 'image/jpeg' }) },
      videoProber: { probeVideo: async () => ({ durationSeconds: 5, mimeType: 'video/mp4' }) },
    };

    const server = new PublishServer({ env: testEnv, collaborators, logger: new Logger() });
    app = server.getApp();
  });

  describe('health endpoint', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'healthy',
        timestamp: expect.any(String),
        version: '0.1.0',
      });
    });
  });

  describe('publish endpoint', () => {
    it('should publish the directory named by the path parameter', async () => {
      const dir = await writeDirectory('intro', {
        'metadata.txt': 'title=Intro\nslug=intro\nsite_id=1',
        'index.html': '<html><body>Intro</body></html>',
      });

      const response = await request(app).post('/publish').query({ path: dir, status: '1' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual(
        expect.objectContaining({
          contentId: 1,
          kind: 'article',
          status: 'published',
          created: true,
          thumbnailUrl: null,
          mediaCount: 0,
        })
      );
      expect(response.body.storedFiles).toContain('index.html');
    });

    it('should take the directory from the request body', async () => {
      const dir = await writeDirectory('body', {
        'metadata.txt': 'title=Body\nslug=body\nsite_id=1',
        'index.html': '<p>body</p>',
        'media/pic.jpg': 'jpg',
      });

      const response = await request(app).post('/publish').set('Content-Type', 'text/plain').send(`${dir}\n`);

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('draft');
      expect(response.body.mediaCount).toBe(1);
      expect(upload).not.toHaveBeenCalled();
    });

    it('should keep an explicit draft request a draft whatever the metadata says', async () => {
      const dir = await writeDirectory('explicit-draft', {
        'metadata.txt': 'title=Draft\nslug=explicit-draft\nsite_id=1\nstatus=1',
        'index.html': '<p>draft</p>',
        'media/pic.jpg': 'jpg',
      });

      const response = await request(app).post('/publish').query({ path: dir, status: '0' });

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('draft');
      expect(upload).not.toHaveBeenCalled();
    });

    it('should reject a request without a content path', async () => {
      const response = await request(app).post('/publish');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'ValidationError', message: 'Missing content path' });
    });

    it('should reject a directory without index.html and write nothing', async () => {
      const dir = await writeDirectory('no-entry', {
        'metadata.txt': 'title=Broken\nslug=broken\nsite_id=1',
      });

      const response = await request(app).post('/publish').query({ path: dir });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'ValidationError',
        message: `Missing index.html in ${dir}`,
      });
      expect(await countBlocks()).toBe(0);
    });

    it('should answer 405 for GET', async () => {
      const response = await request(app).get('/publish');

      expect(response.status).toBe(405);
      expect(response.body.allowed).toBe('POST');
    });
  });

  describe('gallery endpoint', () => {
    it('should publish an image set', async () => {
      const dir = await writeDirectory('set', {
        'metadata.txt': 'title=Set\nslug=set\nsite_id=1\ntype_id=2\ncaption=Evening #sea\nlocation=Harbour\n1=one.jpg',
        'media/one.jpg': 'jpg',
      });

      const response = await request(app).post('/gallery').query({ path: dir, status: '1' });

      expect(response.status).toBe(200);
      expect(response.body.kind).toBe('gallery');
      expect(response.body.status).toBe('published');
      expect(response.body.gallery).toEqual({ images: 1, reels: 0, hashtagCount: 0, link: null });
      expect(response.body.thumbnailUrl).toMatch(/^https:\/\/cdn\.example\.test\/bucket\/images\/thumbnails\/\d+\.jpg$/);
      expect(upload).toHaveBeenCalledTimes(2);
    });
  });

  describe('unknown routes', () => {
    it('should answer 404 with the path', async () => {
      const response = await request(app).post('/unknown');

      expect(response.status).toBe(404);
      expect(response.body.path).toBe('/unknown');
    });
  });
});
