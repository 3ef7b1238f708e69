import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadContract, parseContract, toFieldOptions } from '../../../../src/core/contract/loader.js';
import { ContractDefinitionError, ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

const USERS = `
name: users
fields:
  - name: user_id
    type: integer
    required: true
    unique: true
  - name: age
    type: integer
    min: 0
    max: 120
  - name: country
    allowed: [US, UK, CA]
  - name: signup
    type: timestamp
    min: "2020-01-01T00:00:00Z"
`;

describe('contract loader', () => {
  describe('parseContract', () => {
    it('should build fields in file order', () => {
      const contract = parseContract(USERS);

      expect(contract.name).toBe('users');
      expect(contract.columnNames).toEqual(['user_id', 'age', 'country', 'signup']);
      expect(contract.field('user_id')?.required).toBe(true);
      expect(contract.field('age')?.max).toBe(120);
      expect(contract.field('country')?.allowed).toEqual(['US', 'UK', 'CA']);
    });

    it('should turn timestamp bounds into dates', () => {
      const signup = parseContract(USERS).field('signup');

      expect(signup?.min).toEqual(new Date('2020-01-01T00:00:00Z'));
    });

    it('should reject unknown keys', () => {
      const text = 'fields:\n  - name: a\n    maximum: 3\n';

      expect(() => parseContract(text)).toThrow(ContractDefinitionError);
    });

    it('should reject an unknown type with the field path', () => {
      const text = 'fields:\n  - name: a\n    type: number\n';

      try {
        parseContract(text, 'inline.yaml');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ContractDefinitionError);
        if (!(error instanceof ContractDefinitionError)) return;
        expect(error.code).toBe(ErrorCodes.INVALID_CONTRACT);
        expect(error.message).toContain('fields.0.type');
        expect(error.message).toContain('(source: inline.yaml)');
      }
    });

    it('should reject a contract without fields', () => {
      expect(() => parseContract('name: empty\nfields: []\n')).toThrow(ContractDefinitionError);
    });

    it('should pass semantic errors through from FieldSpec', () => {
      const text = 'fields:\n  - name: a\n    type: integer\n    min: 5\n    max: 1\n';

      expect(() => parseContract(text)).toThrow("Field 'a': min must not be greater than max");
    });

    it('should raise a parse error for malformed YAML', () => {
      expect(() => parseContract('fields: [\n')).toThrow(SystemError);
    });
  });

  describe('toFieldOptions', () => {
    it('should parse allowed timestamps and keep unparseable ones as strings', () => {
      const options = toFieldOptions({
        name: 'at',
        type: 'timestamp',
        required: false,
        unique: false,
        allowed: ['2024-01-01T00:00:00Z', 'soon'],
      });

      expect(options.allowed).toEqual([new Date('2024-01-01T00:00:00Z'), 'soon']);
    });

    it('should leave non-timestamp fields untouched', () => {
      const options = toFieldOptions({ name: 'code', required: false, unique: false, min: 'a' });

      expect(options.min).toBe('a');
    });
  });

  describe('loadContract', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `datacontracts-contract-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(testDir, { recursive: true });
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should load a YAML file', async () => {
      const file = join(testDir, 'users.yaml');
      await writeFile(file, USERS);

      const contract = await loadContract(file);

      expect(contract.fields).toHaveLength(4);
    });

    it('should load a JSON file', async () => {
      const file = join(testDir, 'users.json');
      await writeFile(file, JSON.stringify({ fields: [{ name: 'id', type: 'integer', unique: true }] }));

      const contract = await loadContract(file);

      expect(contract.field('id')?.unique).toBe(true);
    });

    it('should name the file in schema errors', async () => {
      const file = join(testDir, 'broken.yaml');
      await writeFile(file, 'fields: nope\n');

      await expect(loadContract(file)).rejects.toThrow(`(source: ${file})`);
    });
  });
});
