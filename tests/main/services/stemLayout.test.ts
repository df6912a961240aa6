import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { TrackTags } from '../../../src/shared/types';
import { FileReadError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';
import {
  METADATA_FILENAME,
  StemLayout,
  TrackMetadataDocument,
  allStemsExist,
  outputDirName,
  stemPathsIn,
} from '../../../src/main/services/stemLayout';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

function tags(artist: string, title: string): TrackTags {
  return { artist, title, bpm: null, key: null, genre: null };
}

function metadataDocument(dir: string): TrackMetadataDocument {
  return {
    sourceFile: '/music/song.mp3',
    fileHash: HELLO_SHA256,
    artist: 'Test Artist',
    title: 'Song',
    backendId: 'demucs_htdemucs',
    elapsedSeconds: 12.5,
    success: true,
    qualityScores: { vocals: 9.1, drums: 6 },
    stems: stemPathsIn(dir),
    fallback: { attempted: false, backendId: null, used: false, error: null },
    createdAt: '2025-02-17T14:30:00.000Z',
  };
}

describe('stemLayout', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stem-layout-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('outputDirName', () => {
    it('should join sanitized artist, title and short hash', () => {
      expect(outputDirName(tags('AC/DC', 'Back In Black'), HELLO_SHA256)).toBe(
        'AC_DC - Back In Black_2cf24dba',
      );
    });

    it('should substitute Unknown for empty parts', () => {
      expect(outputDirName(tags('', '...'), HELLO_SHA256)).toBe('Unknown - Unknown_2cf24dba');
    });
  });

  describe('stemPathsIn / allStemsExist', () => {
    it('should name the four stems as WAV files', () => {
      expect(stemPathsIn('/out')).toEqual({
        vocals: path.join('/out', 'vocals.wav'),
        drums: path.join('/out', 'drums.wav'),
        bass: path.join('/out', 'bass.wav'),
        other: path.join('/out', 'other.wav'),
      });
    });

    it('should require all four files', () => {
      const paths = stemPathsIn(tempDir);
      fs.writeFileSync(paths.vocals, '');
      fs.writeFileSync(paths.drums, '');
      fs.writeFileSync(paths.bass, '');
      expect(allStemsExist(tempDir)).toBe(false);
      fs.writeFileSync(paths.other, '');
      expect(allStemsExist(tempDir)).toBe(true);
    });
  });

  describe('StemLayout', () => {
    let layout: StemLayout;
    let logger: Logger;
    let sourceFile: string;

    beforeEach(async () => {
      logger = new Logger({ writeToFile: false });
      await logger.initialize();
      layout = new StemLayout(path.join(tempDir, 'stems'), {
        tagReader: async () => tags('Test Artist', 'Song'),
        logger,
      });
      sourceFile = path.join(tempDir, 'song.mp3');
      fs.writeFileSync(sourceFile, 'hello');
    });

    it('should resolve hash, tags and output folder without creating it', async () => {
      const identity = await layout.resolveTrack(sourceFile);
      expect(identity).toEqual({
        filePath: sourceFile,
        fileHash: HELLO_SHA256,
        tags: tags('Test Artist', 'Song'),
        outputDir: path.join(tempDir, 'stems', 'Test Artist - Song_2cf24dba'),
      });
      expect(fs.existsSync(identity.outputDir)).toBe(false);
    });

    it('should keep hostile tags inside the base dir', () => {
      const dir = layout.outputDirFor(tags('../..', '../../etc'), HELLO_SHA256);
      expect(path.dirname(dir)).toBe(layout.getBaseDir());
    });

    it('should wrap tag reader failures as FileReadError', async () => {
      const failing = new StemLayout(tempDir, {
        tagReader: async () => {
          throw new Error('bad frame');
        },
      });
      const error = await failing.resolveTrack(sourceFile).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(FileReadError);
      expect(error).toMatchObject({ message: 'bad frame', step: 'reading_tags' });
    });

    it('should write and read metadata.json', async () => {
      const dir = path.join(layout.getBaseDir(), 'track');
      await layout.writeMetadata(dir, metadataDocument(dir));

      expect(fs.existsSync(path.join(dir, METADATA_FILENAME))).toBe(true);
      expect(await layout.readMetadata(dir)).toEqual(metadataDocument(dir));
    });

    it('should drop scores JSON cannot carry', async () => {
      const dir = path.join(layout.getBaseDir(), 'track');
      await layout.writeMetadata(dir, {
        ...metadataDocument(dir),
        qualityScores: { vocals: Number.POSITIVE_INFINITY, bass: 4 },
      });
      expect((await layout.readMetadata(dir))?.qualityScores).toEqual({ bass: 4 });
    });

    it('should return null for missing metadata', async () => {
      expect(await layout.readMetadata(path.join(tempDir, 'nowhere'))).toBeNull();
      expect(logger.size).toBe(0);
    });

    it('should warn and return null for malformed metadata', async () => {
      const dir = path.join(tempDir, 'bad');
      fs.mkdirSync(dir);
      fs.writeFileSync(path.join(dir, METADATA_FILENAME), JSON.stringify({ success: 'yes' }));
      expect(await layout.readMetadata(dir)).toBeNull();
      expect(logger.getWarnings()[0].message).toBe('Malformed metadata.json');
    });

    it('should warn and return null for unreadable metadata', async () => {
      const dir = path.join(tempDir, 'broken');
      fs.mkdirSync(dir);
      fs.writeFileSync(path.join(dir, METADATA_FILENAME), '{oops');
      expect(await layout.readMetadata(dir)).toBeNull();
      expect(logger.getWarnings()[0].message).toContain('Unreadable metadata.json');
    });
  });
});
