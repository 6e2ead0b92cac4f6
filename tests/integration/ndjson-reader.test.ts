/**
 * Integration test: discovering and streaming NDJSON exports from disk
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { gzipSync } from 'zlib';
import {
  isNdjsonFilename,
  listNdjsonFiles,
  readNdjson,
  readNdjsonFromDir,
  readNdjsonRecords,
} from '../../src/lib/reader/index.js';
import { logger } from '../../src/utils/logger.js';

async function collect<T>(values: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of values) {
    out.push(value);
  }
  return out;
}

describe('NDJSON Reader Integration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ndjson-reader-'));
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});

    await writeFile(
      join(dir, 'Patient.ndjson'),
      '{"resourceType":"Patient","id":"p1"}\n\n{"resourceType":"Patient","id":"p2"}\n',
    );
    await writeFile(
      join(dir, 'cond.jsonl.gz'),
      gzipSync('{"resourceType":"Condition","id":"c1"}\n{"resourceType":"Condition","id":"c2"}\n'),
    );
    await writeFile(join(dir, 'notes.txt'), '{"resourceType":"Patient"}\n');
    await writeFile(join(dir, 'bad.ndjson'), 'not json\n{"resourceType":"Patient"}\n');
    await writeFile(join(dir, 'unknown.ndjson'), '[1,2]\n{"resourceType":"Basic"}\n');
    await mkdir(join(dir, 'sub'));
    await writeFile(join(dir, 'sub', 'Observation.ndjson'), '{"resourceType":"Observation"}\n');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('isNdjsonFilename', () => {
    it('should accept NDJSON and JSON Lines names, optionally gzipped', () => {
      expect(isNdjsonFilename('Patient.ndjson')).toBe(true);
      expect(isNdjsonFilename('Condition.001.JSONL')).toBe(true);
      expect(isNdjsonFilename('/exports/obs.ndjson.gz')).toBe(true);
    });

    it('should reject other names', () => {
      expect(isNdjsonFilename('Patient.json')).toBe(false);
      expect(isNdjsonFilename('Patient.gz')).toBe(false);
      expect(isNdjsonFilename('ndjson')).toBe(false);
    });
  });

  describe('listNdjsonFiles', () => {
    it('should list files sorted by path with their first resource type', async () => {
      const files = await listNdjsonFiles(dir);

      expect(Array.from(files)).toEqual([
        [join(dir, 'Patient.ndjson'), 'Patient'],
        [join(dir, 'cond.jsonl.gz'), 'Condition'],
        [join(dir, 'unknown.ndjson'), null],
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Could not read from file',
        expect.objectContaining({ path: join(dir, 'bad.ndjson') }),
      );
    });

    it('should filter by resource type', async () => {
      const files = await listNdjsonFiles(dir, { resourceTypes: ['Condition'] });
      expect(Array.from(files.keys())).toEqual([join(dir, 'cond.jsonl.gz')]);
    });

    it('should descend into subdirectories when recursive', async () => {
      const files = await listNdjsonFiles(dir, { recursive: true });
      expect(files.get(join(dir, 'sub', 'Observation.ndjson'))).toBe('Observation');
      expect(files.size).toBe(4);
    });

    it('should return an empty index for a missing directory', async () => {
      const files = await listNdjsonFiles(join(dir, 'missing'));

      expect(files.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Input directory does not exist', {
        path: join(dir, 'missing'),
      });
    });
  });

  describe('readNdjson', () => {
    it('should yield parsed lines and skip blank ones', async () => {
      await expect(collect(readNdjson(join(dir, 'Patient.ndjson')))).resolves.toEqual([
        { resourceType: 'Patient', id: 'p1' },
        { resourceType: 'Patient', id: 'p2' },
      ]);
    });

    it('should read gzipped files', async () => {
      const records = await collect(readNdjson(join(dir, 'cond.jsonl.gz')));
      expect(records).toEqual([
        { resourceType: 'Condition', id: 'c1' },
        { resourceType: 'Condition', id: 'c2' },
      ]);
    });

    it('should log and skip lines that are not JSON', async () => {
      const records = await collect(readNdjson(join(dir, 'bad.ndjson')));

      expect(records).toEqual([{ resourceType: 'Patient' }]);
      expect(logger.warn).toHaveBeenCalledWith('Could not decode line', {
        path: join(dir, 'bad.ndjson'),
        line: 1,
        error: expect.any(String),
      });
    });

    it('should log a missing file and yield nothing', async () => {
      const records = await collect(readNdjson(join(dir, 'gone.ndjson')));

      expect(records).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        'Could not read from file',
        expect.objectContaining({ path: join(dir, 'gone.ndjson') }),
      );
    });
  });

  describe('readNdjsonRecords', () => {
    it('should yield only JSON objects across files in order', async () => {
      const records = await collect(
        readNdjsonRecords([join(dir, 'unknown.ndjson'), join(dir, 'Patient.ndjson')]),
      );

      expect(records.map((record) => record.resourceType)).toEqual(['Basic', 'Patient', 'Patient']);
      expect(logger.warn).toHaveBeenCalledWith('Skipping non-object JSON line', {
        path: join(dir, 'unknown.ndjson'),
      });
    });
  });

  describe('readNdjsonFromDir', () => {
    it('should read every object from the listed files in path order', async () => {
      const records = await collect(readNdjsonFromDir(dir));

      expect(records.map((record) => [record.resourceType, record.id])).toEqual([
        ['Patient', 'p1'],
        ['Patient', 'p2'],
        ['Condition', 'c1'],
        ['Condition', 'c2'],
        ['Basic', undefined],
      ]);
    });

    it('should restrict to the requested resource types', async () => {
      const records = await collect(
        readNdjsonFromDir(dir, { resourceTypes: ['Observation', 'Condition'], recursive: true }),
      );

      expect(records.map((record) => record.resourceType)).toEqual([
        'Condition',
        'Condition',
        'Observation',
      ]);
    });

    it('should yield nothing for a missing directory', async () => {
      await expect(collect(readNdjsonFromDir(join(dir, 'missing')))).resolves.toEqual([]);
    });
  });
});
