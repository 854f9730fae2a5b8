import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConditionalFetcher } from '../../src/infrastructure/http/ConditionalFetcher.js';
import { FileSystemArtifactCache } from '../../src/infrastructure/cache/FileSystemArtifactCache.js';
import { ManifestDiscovery } from '../../src/infrastructure/discovery/ManifestDiscovery.js';
import { GitHubTreeDiscovery } from '../../src/infrastructure/discovery/GitHubTreeDiscovery.js';
import { DiscoveryRouter } from '../../src/infrastructure/discovery/DiscoveryRouter.js';
import { FakeRemote } from '../helpers/FakeRemote.js';
import { makeSource } from '../helpers/sources.js';

const MANIFEST_URL = 'https://cdn.example.test/pack/manifest.txt';
const TREE_URL = 'https://api.example.test/repos/acme/agents/git/trees/main?recursive=1';

describe('Artifact discovery', () => {
  let tmpDir: string;
  let remote: FakeRemote;
  let cache: FileSystemArtifactCache;
  let fetcher: ConditionalFetcher;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'artisync-discovery-'));
    remote = new FakeRemote();
    cache = new FileSystemArtifactCache(tmpDir);
    fetcher = new ConditionalFetcher({ fetchImpl: remote.fetch });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('ManifestDiscovery', () => {
    it('should fetch the manifest and keep a cached copy', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\nskills/pdf/SKILL.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);
      const source = makeSource();

      const result = await discovery.discover(source);

      expect(result).toEqual({ ok: true, paths: ['agents/a.md', 'skills/pdf/SKILL.md'], rejected: [], etag: '"m1"' });
      const cachedCopy = path.join(cache.sourceDir(source), '.artisync-manifest');
      expect(fs.readFileSync(cachedCopy, 'utf-8')).toBe('agents/a.md\nskills/pdf/SKILL.md\n');
    });

    it('should expose the last discovered listing without a request', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);
      const source = makeSource();

      expect(await discovery.lastListing(source)).toBeUndefined();
      await discovery.discover(source);
      const requestsBefore = remote.requests.length;

      expect(await discovery.lastListing(source)).toEqual(['agents/a.md']);
      expect(remote.requests).toHaveLength(requestsBefore);
    });

    it('should not overwrite the cached copy with a rejected manifest', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);
      await discovery.discover(makeSource());
      remote.set(MANIFEST_URL, '{ "files": ', '"m2"');

      const result = await discovery.discover(makeSource({ lastEtag: '"m1"' }));

      expect(result.ok).toBe(false);
      expect(await discovery.lastListing(makeSource())).toEqual(['agents/a.md']);
    });

    it('should keep listings of sources on the same URL apart', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);
      await discovery.discover(makeSource({ id: 'first' }));

      expect(await discovery.lastListing(makeSource({ id: 'second' }))).toBeUndefined();
      expect(cache.sourceDir(makeSource({ id: 'first' }))).not.toBe(cache.sourceDir(makeSource({ id: 'second' })));
    });

    /**
     * Scenario: manifest 未變更
     * Given 上次 sync 記錄了 manifest ETag "m1"，快取中有 manifest 副本
     * When 再次 discover
     * Then 送出 If-None-Match，收到 304，路徑取自快取副本
     */
    it('should reuse the cached manifest on 304', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);
      await discovery.discover(makeSource());

      const result = await discovery.discover(makeSource({ lastEtag: '"m1"' }));

      expect(result).toEqual({ ok: true, paths: ['agents/a.md'], rejected: [], etag: '"m1"' });
      expect(remote.requests.map((r) => r.ifNoneMatch)).toEqual([undefined, '"m1"']);
    });

    it('should refetch when the server says 304 but the cached copy is gone', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);

      const result = await discovery.discover(makeSource({ lastEtag: '"m1"' }));

      expect(result).toMatchObject({ ok: true, paths: ['agents/a.md'], etag: '"m1"' });
      expect(remote.requests.map((r) => r.ifNoneMatch)).toEqual(['"m1"', undefined]);
    });

    it('should skip the ETag when forced', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n', '"m1"');
      const discovery = new ManifestDiscovery(fetcher, cache);

      await discovery.discover(makeSource({ lastEtag: '"m1"' }), { force: true });

      expect(remote.requests).toHaveLength(1);
      expect(remote.requests[0].ifNoneMatch).toBeUndefined();
    });

    it('should resolve the manifest inside the source subdirectory', async () => {
      remote.set('https://cdn.example.test/pack/agents/index.json', '["reviewer.md"]');
      const discovery = new ManifestDiscovery(fetcher, cache);

      const result = await discovery.discover(makeSource({ subdirectory: 'agents', manifestPath: 'index.json' }));

      expect(result).toMatchObject({ ok: true, paths: ['reviewer.md'] });
    });

    it('should report unsafe entries', async () => {
      remote.set(MANIFEST_URL, 'agents/a.md\n../secrets.md\n');
      const discovery = new ManifestDiscovery(fetcher, cache);

      const result = await discovery.discover(makeSource());

      expect(result).toMatchObject({ ok: true, paths: ['agents/a.md'], rejected: ['../secrets.md'] });
    });

    it('should fail when the manifest is unavailable', async () => {
      const discovery = new ManifestDiscovery(fetcher, cache);

      const result = await discovery.discover(makeSource());

      expect(result).toEqual({
        ok: false,
        detail: `listing unavailable: GET ${MANIFEST_URL} returned HTTP 404 Not Found`,
      });
    });

    it('should fail when the manifest is malformed', async () => {
      remote.set(MANIFEST_URL, '{ "files": ');
      const discovery = new ManifestDiscovery(fetcher, cache);

      const result = await discovery.discover(makeSource());

      expect(result).toEqual({ ok: false, detail: 'listing rejected: Manifest is not valid JSON' });
    });
  });

  describe('GitHubTreeDiscovery', () => {
    const tree = JSON.stringify({
      tree: [
        { path: 'agents', type: 'tree' },
        { path: 'agents/a.md', type: 'blob' },
        { path: 'agents/sub/b.MD', type: 'blob' },
        { path: 'agents/readme.txt', type: 'blob' },
        { path: 'other/c.md', type: 'blob' },
      ],
      truncated: false,
    });

    it('should list markdown blobs under the subdirectory', async () => {
      remote.set(TREE_URL, tree, '"t1"');
      const discovery = new GitHubTreeDiscovery(fetcher, cache, 'https://api.example.test');

      const result = await discovery.discover(makeSource({
        url: 'https://github.com/acme/agents',
        subdirectory: 'agents',
        discovery: 'github-tree',
      }));

      expect(result).toEqual({ ok: true, paths: ['a.md', 'sub/b.MD'], rejected: [], etag: '"t1"' });
    });

    it('should list every markdown blob without a subdirectory', async () => {
      remote.set(TREE_URL, tree);
      const discovery = new GitHubTreeDiscovery(fetcher, cache, 'https://api.example.test');

      const result = await discovery.discover(makeSource({ url: 'https://github.com/acme/agents', discovery: 'github-tree' }));

      expect(result).toMatchObject({ ok: true, paths: ['agents/a.md', 'agents/sub/b.MD', 'other/c.md'] });
    });

    it('should require a github.com URL', async () => {
      const discovery = new GitHubTreeDiscovery(fetcher, cache, 'https://api.example.test');

      const result = await discovery.discover(makeSource({ discovery: 'github-tree' }));

      expect(result).toEqual({
        ok: false,
        detail: 'github-tree discovery requires a github.com repository URL, got https://cdn.example.test/pack',
      });
      expect(remote.requests).toEqual([]);
    });

    it('should reject a response that is not a tree listing', async () => {
      remote.set(TREE_URL, '{"message":"Not Found"}');
      const discovery = new GitHubTreeDiscovery(fetcher, cache, 'https://api.example.test');

      const result = await discovery.discover(makeSource({ url: 'https://github.com/acme/agents', discovery: 'github-tree' }));

      expect(result).toEqual({
        ok: false,
        detail: 'listing rejected: Tree listing does not match the git trees API format',
      });
    });
  });

  it('should route on source.discovery', async () => {
    remote.set(MANIFEST_URL, 'from-manifest.md\n');
    remote.set(TREE_URL, JSON.stringify({ tree: [{ path: 'from-tree.md', type: 'blob' }] }));
    const router = new DiscoveryRouter({
      'manifest': new ManifestDiscovery(fetcher, cache),
      'github-tree': new GitHubTreeDiscovery(fetcher, cache, 'https://api.example.test'),
    });

    await expect(router.discover(makeSource())).resolves.toMatchObject({ paths: ['from-manifest.md'] });
    await expect(router.discover(makeSource({ url: 'https://github.com/acme/agents', discovery: 'github-tree' })))
      .resolves.toMatchObject({ paths: ['from-tree.md'] });
  });
});
