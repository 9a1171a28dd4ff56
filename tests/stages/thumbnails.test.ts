import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createArtifact } from '../../src/domain/artifact';
import { TransientStageError } from '../../src/engine/failure';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { createThumbnailStage } from '../../src/stages/thumbnails';
import { FakeObjectStore, FakeOptimizer, stageContext } from './fakes';

async function exists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false,
  );
}

describe('thumbnail stage', () => {
  let outputDir: string;
  let store: FakeObjectStore;
  let optimizer: FakeOptimizer;

  beforeEach(async () => {
    setLogHandler(() => undefined);
    outputDir = await mkdtemp(join(tmpdir(), 'thumbnail-stage-'));
    store = new FakeObjectStore();
    optimizer = new FakeOptimizer();
  });

  afterEach(async () => {
    resetLogHandler();
    await rm(outputDir, { recursive: true, force: true });
  });

  function stage() {
    return createThumbnailStage({ optimizer, store, bucket: 'media', outputDir, format: 'webp', quality: 80 });
  }

  it('renders and publishes every default size', async () => {
    const artifact = createArtifact({ sourcePath: 'cat.jpg', key: 'photos/cat.jpg', content: Buffer.from('jpgbytes') });

    const { artifact: produced, effect } = await stage().execute(artifact, stageContext('thumbnails'));

    const keys = ['thumbnails/photos/cat_large.webp', 'thumbnails/photos/cat_medium.webp', 'thumbnails/photos/cat_small.webp'];
    const paths = [
      join(outputDir, 'thumbnails', 'photos', 'cat_large.webp'),
      join(outputDir, 'thumbnails', 'photos', 'cat_medium.webp'),
      join(outputDir, 'thumbnails', 'photos', 'cat_small.webp'),
    ];
    expect(optimizer.resizeCalls).toEqual([
      { width: 1920, height: 1080, format: 'webp', quality: 80 },
      { width: 1280, height: 720, format: 'webp', quality: 80 },
      { width: 640, height: 360, format: 'webp', quality: 80 },
    ]);
    expect(await readFile(paths[2], 'utf8')).toBe('640x360');
    expect(store.objects.get('media/thumbnails/photos/cat_medium.webp')).toEqual({
      body: Buffer.from('1280x720'),
      contentType: 'image/webp',
      metadata: { 'artifact-id': artifact.id, 'thumbnail-size': 'medium' },
    });
    expect(produced.key).toBe('photos/cat.jpg');
    expect(produced.content?.toString()).toBe('jpgbytes');
    expect(produced.attributes).toEqual({
      publishedKeys: JSON.stringify(keys),
      thumbnails: 'generated',
      thumbnailKeys: keys.join(','),
    });
    expect(effect).toEqual({
      kind: 'thumbnails.published',
      description: 'Published 3 thumbnails of photos/cat.jpg',
      resource: { bucket: 'media', keys: JSON.stringify(keys), paths: JSON.stringify(paths) },
    });
  });

  it('compensates by removing every object and file, and tolerates replays', async () => {
    const thumbnails = stage();
    const artifact = createArtifact({ sourcePath: 'dog.png', content: Buffer.from('pngbytes') });
    const { effect } = await thumbnails.execute(artifact, stageContext('thumbnails'));
    if (!effect || !thumbnails.compensate) throw new Error('expected an effect and a compensating action');
    expect(store.objects.size).toBe(3);

    const committed = { ...effect, id: 'eff_1', stage: 'thumbnails', committedAt: '2026-03-01T10:00:00.000Z' };
    await thumbnails.compensate(committed, stageContext('thumbnails'));

    expect(store.objects.size).toBe(0);
    expect(await exists(join(outputDir, 'thumbnails', 'dog_large.webp'))).toBe(false);
    expect(store.calls.slice(3)).toEqual([
      'delete media/thumbnails/dog_small.webp',
      'delete media/thumbnails/dog_medium.webp',
      'delete media/thumbnails/dog_large.webp',
    ]);
    await expect(thumbnails.compensate(committed, stageContext('thumbnails'))).resolves.toBeUndefined();
  });

  it('removes what it published when an upload fails part way', async () => {
    store.failPut('thumbnails/cat_medium.webp', new TransientStageError('connection reset'));
    const artifact = createArtifact({ sourcePath: 'cat.jpg', content: Buffer.from('jpgbytes') });

    await expect(stage().execute(artifact, stageContext('thumbnails'))).rejects.toBeInstanceOf(TransientStageError);

    expect(store.calls).toEqual([
      'put media/thumbnails/cat_large.webp',
      'put media/thumbnails/cat_medium.webp',
      'delete media/thumbnails/cat_medium.webp',
      'delete media/thumbnails/cat_large.webp',
    ]);
    expect(store.objects.size).toBe(0);
    expect(await exists(join(outputDir, 'thumbnails', 'cat_large.webp'))).toBe(false);
    expect(await exists(join(outputDir, 'thumbnails', 'cat_medium.webp'))).toBe(false);
  });

  it('skips thumbnails for an image that cannot be decoded', async () => {
    optimizer.error = new Error('Input buffer contains unsupported image format');
    const artifact = createArtifact({ sourcePath: 'broken.png', content: Buffer.from('nope') });

    const execution = await stage().execute(artifact, stageContext('thumbnails'));

    expect(execution.effect).toBeUndefined();
    expect(execution.artifact.attributes).toEqual({ thumbnails: 'skipped' });
    expect(store.calls).toEqual([]);
  });

  it('respects an artifact that opts out', async () => {
    const artifact = createArtifact({ sourcePath: 'cat.jpg', content: Buffer.from('jpg'), attributes: { thumbnails: 'disabled' } });
    const execution = await stage().execute(artifact, stageContext('thumbnails'));
    expect(execution.effect).toBeUndefined();
    expect(optimizer.resizeCalls).toEqual([]);
  });

  it('passes files that are not images through', async () => {
    const artifact = createArtifact({ sourcePath: 'notes.txt', content: Buffer.from('hello') });
    const execution = await stage().execute(artifact, stageContext('thumbnails'));
    expect(execution.effect).toBeUndefined();
    expect(execution.artifact.attributes).toEqual({});
    expect(optimizer.resizeCalls).toEqual([]);
  });
});
