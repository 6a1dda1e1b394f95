import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { FileUtils } from '../file-utils.js';
import { NotFoundError, ParsingError, ValidationError } from '../errors.js';

vi.mock('../../logger.js', () => ({
  default: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('FileUtils', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'task-graph-files-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('readJsonFile', () => {
    it('should parse a JSON document', async () => {
      const filePath = path.join(tempDir, 'graph.json');
      await fs.writeFile(filePath, '{"graph_id":"g","nodes":{}}');

      expect(await FileUtils.readJsonFile(filePath)).toEqual({ graph_id: 'g', nodes: {} });
    });

    it('should report a missing file', async () => {
      await expect(FileUtils.readJsonFile(path.join(tempDir, 'missing.json'))).rejects.toThrow(NotFoundError);
    });

    it('should refuse a directory', async () => {
      await expect(FileUtils.readJsonFile(tempDir)).rejects.toThrow(ValidationError);
    });

    it('should wrap invalid JSON in a parsing error', async () => {
      const filePath = path.join(tempDir, 'broken.json');
      await fs.writeFile(filePath, '{ not json');

      await expect(FileUtils.readJsonFile(filePath)).rejects.toThrow(ParsingError);
      await expect(FileUtils.readJsonFile(filePath)).rejects.toThrow(`Invalid JSON in ${filePath}`);
    });
  });

  describe('writeTextFile', () => {
    it('should create parent directories', async () => {
      const filePath = path.join(tempDir, 'a', 'b', 'out.txt');

      await FileUtils.writeTextFile(filePath, 'hello');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('hello');
    });
  });
});
