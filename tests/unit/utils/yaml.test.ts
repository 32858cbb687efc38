/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes, SystemError } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({ region: z.string(), colors: z.boolean().default(true) });

describe('parseYaml', () => {
  it('should parse a mapping', () => {
    expect(parseYaml('region: GB\ncolors: false\n')).toEqual({ region: 'GB', colors: false });
  });

  it('should throw a SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply defaults', () => {
    expect(parseYamlWithSchema('region: GB\n', schema)).toEqual({ region: 'GB', colors: true });
  });

  it('should report validation failures with their path', () => {
    expect(() => parseYamlWithSchema('region: 44\n', schema)).toThrow(
      'YAML validation failed: region: Expected string, received number'
    );
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate a file', async () => {
    mockReadFile.mockResolvedValue('region: FR\n');

    expect(await loadYamlWithSchema('/tmp/config.yaml', schema)).toEqual({ region: 'FR', colors: true });
    expect(mockReadFile).toHaveBeenCalledWith('/tmp/config.yaml');
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/tmp/missing.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_LOAD_ERROR,
      details: { filePath: '/tmp/missing.yaml', error: 'ENOENT' },
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('colors: true\n');

    const load = loadYamlWithSchema('/tmp/config.yaml', schema);

    await expect(load).rejects.toBeInstanceOf(ConfigError);
    await expect(load).rejects.toThrow('(file: /tmp/config.yaml)');
  });
});

describe('formatZodError', () => {
  it('should join issues with semicolons', () => {
    const result = schema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe('region: Required');
    }
  });
});
