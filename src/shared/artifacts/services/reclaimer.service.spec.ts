import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ErrorKind } from '../../common/errors/retrieval.error';
import type { ITranscoder } from '../interfaces/artifact.interface';
import { ArtifactLockService } from './artifact-lock.service';
import { ArtifactStoreService } from './artifact-store.service';
import { ReclaimerService } from './reclaimer.service';

const NOW = new Date('2025-06-01T00:00:00.000Z');

async function exists(target: string): Promise<boolean> {
  return fs.stat(target).then(
    () => true,
    () => false,
  );
}

describe('ReclaimerService', () => {
  let root: string;
  let normalize: jest.Mock<Promise<string>, [string]>;
  let store: ArtifactStoreService;
  let reclaimer: ReclaimerService;

  function build(artifactRoot: string) {
    const transcoder: ITranscoder = { normalize };
    const locks = new ArtifactLockService();
    store = new ArtifactStoreService(
      new ConfigService({ ARTIFACT_ROOT: artifactRoot, ARTIFACT_TTL_MINUTES: 60 }),
      transcoder,
      locks,
    );
    reclaimer = new ReclaimerService(store, locks);
  }

  async function artifact(name: string, marker?: string) {
    await fs.mkdir(path.join(root, name), { recursive: true });
    await fs.writeFile(path.join(root, name, `${name}.mp4`), 'video');
    if (marker !== undefined) {
      await fs.writeFile(path.join(root, name, 'expiry_timestamp.txt'), marker);
    }
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'reclaimer-'));
    normalize = jest.fn<Promise<string>, [string]>(async (input) => input);
    build(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('deletes only directories whose marker is in the past', async () => {
    await artifact('expired', '2025-05-31T23:00:00.000Z');
    await artifact('fresh', '2025-06-01T01:00:00.000Z');
    await artifact('pending');
    await artifact('corrupt', 'not-a-date');
    await fs.writeFile(path.join(root, 'stray.txt'), 'not a directory');

    const report = await reclaimer.sweepOnce(NOW);

    expect(report).toEqual({ scanned: 4, deleted: 1, skipped: 3, failed: 0 });
    expect(await exists(path.join(root, 'expired'))).toBe(false);
    expect(await exists(path.join(root, 'fresh'))).toBe(true);
    expect(await exists(path.join(root, 'pending'))).toBe(true);
    expect(await exists(path.join(root, 'corrupt'))).toBe(true);
    expect(await exists(path.join(root, 'stray.txt'))).toBe(true);
  });

  it('keeps a directory whose expiry is exactly now', async () => {
    await artifact('edge', NOW.toISOString());

    const report = await reclaimer.sweepOnce(NOW);

    expect(report.deleted).toBe(0);
    expect(await exists(path.join(root, 'edge'))).toBe(true);
  });

  it('accepts markers without a timezone', async () => {
    await artifact('naive', '2020-01-01T10:00:00');

    await expect(reclaimer.sweepOnce(NOW)).resolves.toMatchObject({
      deleted: 1,
    });
  });

  it('skips directories whose marker only loosely resembles a date', async () => {
    await artifact('digits', '12');
    await artifact('words', 'garbage 1');
    await artifact('sentence', 'expires soon 3');

    const report = await reclaimer.sweepOnce(NOW);

    expect(report).toEqual({ scanned: 3, deleted: 0, skipped: 3, failed: 0 });
    expect(await exists(path.join(root, 'digits'))).toBe(true);
    expect(await exists(path.join(root, 'words'))).toBe(true);
    expect(await exists(path.join(root, 'sentence'))).toBe(true);
  });

  it('finds nothing left behind by a failed transcode', async () => {
    normalize.mockRejectedValueOnce(new Error('ffmpeg exited with code 1'));
    await expect(
      store.put('broken', Buffer.from('raw'), ''),
    ).rejects.toMatchObject({ kind: ErrorKind.TranscodeFailed });

    const report = await reclaimer.sweepOnce(new Date('2099-01-01T00:00:00Z'));

    expect(report).toEqual({ scanned: 0, deleted: 0, skipped: 0, failed: 0 });
    expect(await exists(path.join(root, 'broken'))).toBe(false);
  });

  it('deletes artifacts written by the store once they expire', async () => {
    await store.put('ABC123', Buffer.from('raw'), 'caption');

    const inAnHour = await reclaimer.sweepOnce(new Date(Date.now() + 30 * 60_000));
    expect(inAnHour.deleted).toBe(0);

    const later = await reclaimer.sweepOnce(new Date(Date.now() + 61 * 60_000));
    expect(later.deleted).toBe(1);
    expect(await exists(path.join(root, 'ABC123'))).toBe(false);
  });

  it('keeps sweeping when one directory fails', async () => {
    // a marker that is a directory cannot be read
    await fs.mkdir(path.join(root, 'weird', 'expiry_timestamp.txt'), {
      recursive: true,
    });
    await artifact('expired', '2025-01-01T00:00:00.000Z');

    const report = await reclaimer.sweepOnce(NOW);

    expect(report).toEqual({ scanned: 2, deleted: 1, skipped: 0, failed: 1 });
    expect(await exists(path.join(root, 'expired'))).toBe(false);
  });

  it('returns an empty report when the root does not exist', async () => {
    build(path.join(root, 'missing'));

    await expect(reclaimer.sweepOnce(NOW)).resolves.toEqual({
      scanned: 0,
      deleted: 0,
      skipped: 0,
      failed: 0,
    });
  });

  it('logs instead of throwing from the scheduled sweep', async () => {
    const notADirectory = path.join(root, 'file-root');
    await fs.writeFile(notADirectory, 'x');
    build(notADirectory);

    await expect(reclaimer.scheduledSweep()).resolves.toBeUndefined();
  });
});
