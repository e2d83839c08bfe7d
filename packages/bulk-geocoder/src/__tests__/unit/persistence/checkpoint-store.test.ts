/**
 * Checkpoint Store Tests
 *
 * Loading reconciles the sidecar with the rows actually in the output.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '../../../core/errors.js';
import { outputHeader } from '../../../core/types.js';
import {
  CheckpointStore,
  initialCheckpoint,
  type Checkpoint,
  type CheckpointContext,
} from '../../../persistence/checkpoint-store.js';
import { CsvOutputFile } from '../../../persistence/csv-output.js';
import { DEFAULT_CSV_FORMAT } from '../../../persistence/csv-format.js';
import {
  RecordingLogger,
  createTempDir,
  readText,
  removeTempDir,
  writeText,
} from '../../utils/mocks.js';

const HEADER_LINE = 'id,address,latitude,longitude,geocode_status,geocode_address';

function outputRow(index: number): string {
  return `${index},${index} Main St,1.5,2.5,success,${index} Main St`;
}

function outputFile(rows: number, tail = ''): string {
  const lines = [HEADER_LINE];
  for (let i = 0; i < rows; i++) {
    lines.push(outputRow(i));
  }
  return `${lines.join('\n')}\n${tail}`;
}

describe('CheckpointStore', () => {
  let dir: string;
  let outputPath: string;
  let logger: RecordingLogger;
  let store: CheckpointStore;
  let context: CheckpointContext;

  const sidecar = (overrides: Partial<Checkpoint>): Checkpoint => ({
    ...initialCheckpoint({ providerId: 'nominatim', chunkSize: 2, inputPath: 'input.csv' }),
    ...overrides,
  });

  const writeSidecar = async (checkpoint: unknown): Promise<void> => {
    await writeText(store.path, JSON.stringify(checkpoint));
  };

  beforeEach(async () => {
    dir = await createTempDir();
    outputPath = join(dir, 'out.csv');
    logger = new RecordingLogger();
    store = new CheckpointStore(new CsvOutputFile(outputPath, DEFAULT_CSV_FORMAT), logger);
    context = {
      providerId: 'nominatim',
      chunkSize: 2,
      inputPath: 'input.csv',
      expectedHeader: outputHeader(['id', 'address']),
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should place the sidecar next to the output', () => {
    expect(store.path).toBe(`${outputPath}.checkpoint.json`);
  });

  describe('load', () => {
    it('should return null without an output file', async () => {
      await expect(store.load(context)).resolves.toBeNull();
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should warn and return null when only the sidecar exists', async () => {
      await writeSidecar(sidecar({ lastCompletedIndex: 3, rowsWritten: 4 }));

      await expect(store.load(context)).resolves.toBeNull();
      expect(logger.messages('warn')).toEqual([
        'Checkpoint found but output file is missing; starting fresh',
      ]);
    });

    it('should return null for an empty output file', async () => {
      await writeText(outputPath, '');

      await expect(store.load(context)).resolves.toBeNull();
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should start fresh over an empty output file with a sidecar', async () => {
      await writeText(outputPath, '');
      await writeSidecar(sidecar({ lastCompletedIndex: 3, rowsWritten: 4 }));

      await expect(store.load(context)).resolves.toBeNull();
      expect(logger.messages('warn')).toEqual([
        'Checkpoint found but output file is missing; starting fresh',
      ]);
    });

    it('should resume after the committed rows', async () => {
      await writeText(outputPath, outputFile(4));
      await writeSidecar(sidecar({ lastCompletedIndex: 3, rowsWritten: 4 }));

      const loaded = await store.load(context);

      expect(loaded).toMatchObject({
        checkpoint: { lastCompletedIndex: 3, rowsWritten: 4, status: 'running' },
        counts: { succeeded: 4, failed: 0, skipped: 0 },
        source: 'sidecar',
        repaired: false,
      });
    });

    it('should cut rows appended after the last commit', async () => {
      await writeText(outputPath, outputFile(5));
      await writeSidecar(sidecar({ lastCompletedIndex: 1, rowsWritten: 2 }));

      const loaded = await store.load(context);

      expect(loaded).toMatchObject({
        checkpoint: { lastCompletedIndex: 1, rowsWritten: 2 },
        repaired: true,
      });
      expect(logger.messages('warn')).toEqual(['Removing uncommitted rows from output']);
      await expect(readText(outputPath)).resolves.toBe(outputFile(2));
    });

    it('should cut a torn final line', async () => {
      await writeText(outputPath, outputFile(2, '2,2 Main'));
      await writeSidecar(sidecar({ lastCompletedIndex: 1, rowsWritten: 2 }));

      const loaded = await store.load(context);

      expect(loaded?.checkpoint.lastCompletedIndex).toBe(1);
      expect(loaded?.repaired).toBe(true);
      await expect(readText(outputPath)).resolves.toBe(outputFile(2));
    });

    it('should rewind when the output holds fewer rows than committed', async () => {
      await writeText(outputPath, outputFile(1));
      await writeSidecar(sidecar({ lastCompletedIndex: 3, rowsWritten: 4, status: 'completed' }));

      const loaded = await store.load(context);

      expect(loaded?.checkpoint).toMatchObject({
        lastCompletedIndex: 0,
        rowsWritten: 1,
        status: 'running',
      });
      expect(logger.messages('warn')).toEqual([
        'Output holds fewer rows than the checkpoint; rewinding',
      ]);
    });

    it('should keep a completed status when the rows match', async () => {
      await writeText(outputPath, outputFile(2));
      await writeSidecar(sidecar({ lastCompletedIndex: 1, rowsWritten: 2, status: 'completed' }));

      const loaded = await store.load(context);

      expect(loaded?.checkpoint.status).toBe('completed');
    });

    it('should infer the position from the output without a sidecar', async () => {
      await writeText(outputPath, outputFile(3));

      const loaded = await store.load(context);

      expect(loaded).toMatchObject({
        checkpoint: { lastCompletedIndex: 2, rowsWritten: 3, status: 'running' },
        source: 'output-rows',
        repaired: false,
      });
    });

    it('should fall back to the output rows for an unparseable sidecar', async () => {
      await writeText(outputPath, outputFile(3));
      await writeText(store.path, '{"version": 1, "lastComp');

      const loaded = await store.load(context);

      expect(loaded?.source).toBe('output-rows');
      expect(loaded?.checkpoint.lastCompletedIndex).toBe(2);
      expect(logger.messages('warn')).toEqual(['Ignoring unparseable checkpoint file']);
    });

    it('should fall back to the output rows for a sidecar of the wrong shape', async () => {
      await writeText(outputPath, outputFile(3));
      await writeSidecar({ ...sidecar({}), lastCompletedIndex: 'two' });

      const loaded = await store.load(context);

      expect(loaded?.source).toBe('output-rows');
      expect(logger.messages('warn')).toEqual(['Ignoring invalid checkpoint file']);
    });

    it('should reject an output written for another input layout', async () => {
      await writeText(outputPath, 'id,street,latitude,longitude,geocode_status,geocode_address\n');

      await expect(store.load(context)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should warn and switch to the new provider', async () => {
      await writeText(outputPath, outputFile(2));
      await writeSidecar(sidecar({ providerId: 'google', lastCompletedIndex: 1, rowsWritten: 2 }));

      const loaded = await store.load(context);

      expect(loaded?.checkpoint.providerId).toBe('nominatim');
      expect(logger.messages('warn')).toEqual([
        'Checkpoint was written by a different provider; continuing with the new one',
      ]);
    });

    it('should adopt the chunk size of the current run', async () => {
      await writeText(outputPath, outputFile(2));
      await writeSidecar(sidecar({ chunkSize: 500, lastCompletedIndex: 1, rowsWritten: 2 }));

      const loaded = await store.load(context);

      expect(loaded?.checkpoint.chunkSize).toBe(2);
    });
  });

  describe('commit', () => {
    it('should persist a stamped checkpoint that load reads back', async () => {
      await writeText(outputPath, outputFile(2));

      const committed = await store.commit(sidecar({ lastCompletedIndex: 1, rowsWritten: 2 }));
      const onDisk: unknown = JSON.parse(await readText(store.path));

      expect(onDisk).toEqual(committed);
      expect(Number.isNaN(Date.parse(committed.updatedAt))).toBe(false);

      const loaded = await store.load(context);
      expect(loaded?.source).toBe('sidecar');
      expect(loaded?.checkpoint.lastCompletedIndex).toBe(1);
    });
  });

  describe('clear', () => {
    it('should remove the sidecar', async () => {
      await store.commit(sidecar({}));

      await store.clear();

      await expect(access(store.path)).rejects.toThrow();
    });

    it('should succeed when there is nothing to remove', async () => {
      await expect(store.clear()).resolves.toBeUndefined();
    });
  });
});
