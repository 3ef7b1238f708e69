import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadDataset, parseDataset } from '../../../../src/core/dataset/loader.js';
import { DatasetShapeError, SystemError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('dataset loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `datacontracts-dataset-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('parseDataset', () => {
    it('should parse JSON rows', () => {
      const table = parseDataset('[{"id": 1}, {"id": 2}]', 'json');

      expect(table.column('id')).toEqual([1, 2]);
    });

    it('should parse a YAML column map', () => {
      const table = parseDataset('id: [1, 2, 3]\nname: [a, b, c]\n', 'yaml');

      expect(table.columnNames).toEqual(['id', 'name']);
      expect(table.column('name')).toEqual(['a', 'b', 'c']);
    });

    it('should raise a parse error for malformed JSON', () => {
      expect(() => parseDataset('[{', 'json', 'bad.json')).toThrow(SystemError);
    });

    it('should raise a shape error for non-tabular JSON', () => {
      expect(() => parseDataset('"hello"', 'json')).toThrow(DatasetShapeError);
    });

    it('should parse ISO strings in timestamp columns', () => {
      const table = parseDataset(
        '[{"signup": "2021-05-01T00:00:00Z", "note": "2021-05-01"}, {"signup": "tomorrow", "note": "x"}]',
        'json',
        'rows.json',
        { timestampColumns: ['signup'] }
      );

      expect(table.column('signup')).toEqual([new Date('2021-05-01T00:00:00Z'), 'tomorrow']);
      expect(table.column('note')).toEqual(['2021-05-01', 'x']);
    });

    it('should leave non-string cells of timestamp columns alone', () => {
      const table = parseDataset('signup: [5, null]\n', 'yaml', 'rows.yaml', { timestampColumns: ['signup'] });

      expect(table.column('signup')).toEqual([5, null]);
    });
  });

  describe('loadDataset', () => {
    it('should load a JSON file', async () => {
      const file = join(testDir, 'users.json');
      await writeFile(file, JSON.stringify([{ age: 25 }, { age: 999 }]));

      const table = await loadDataset(file);

      expect(table.column('age')).toEqual([25, 999]);
    });

    it('should pick the YAML parser by extension', async () => {
      const file = join(testDir, 'users.YML');
      await writeFile(file, '- age: 25\n- age: 30\n');

      const table = await loadDataset(file);

      expect(table.rowCount).toBe(2);
    });

    it('should report a missing file', async () => {
      await expect(loadDataset(join(testDir, 'missing.json'))).rejects.toMatchObject({
        code: ErrorCodes.FILE_NOT_FOUND,
      });
    });
  });
});
