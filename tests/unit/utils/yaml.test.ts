/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import {
  loadYamlWithSchema,
  parseYaml,
  parseYamlWithSchema,
} from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  size: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse YAML content', () => {
    expect(parseYaml('name: bar\nitems:\n  - a\n  - b\n')).toEqual({ name: 'bar', items: ['a', 'b'] });
  });

  it('should throw SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: bar\n', Schema)).toEqual({ name: 'bar', size: 1 });
  });

  it('should name the failing field', () => {
    expect(() => parseYamlWithSchema('size: 2\n', Schema)).toThrow(/name:/);
  });
});

describe('loadYamlWithSchema', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'confweave-yaml-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load and validate a file', () => {
    const filePath = join(tempDir, 'a.yaml');
    writeFileSync(filePath, 'name: bar\nsize: 3\n');

    expect(loadYamlWithSchema(filePath, Schema)).toEqual({ name: 'bar', size: 3 });
  });

  it('should add the file path to validation errors', () => {
    const filePath = join(tempDir, 'a.yaml');
    writeFileSync(filePath, 'size: 3\n');

    expect(() => loadYamlWithSchema(filePath, Schema)).toThrow(`(file: ${filePath})`);
  });

  it('should report unreadable files', () => {
    try {
      loadYamlWithSchema(join(tempDir, 'missing.yaml'), Schema);
      expect.fail('expected a read error');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error).toMatchObject({ code: ErrorCodes.READ_ERROR });
    }
  });
});
