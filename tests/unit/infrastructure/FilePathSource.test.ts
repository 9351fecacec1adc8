import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'ndjson-loader-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as chunks', async () => {
      const filePath = writeTempFile('read-basic.njson', '{"index":{"_id":"1"}}\n{"a":1}\n');
      const source = new FilePathSource(filePath);

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.join('')).toBe('{"index":{"_id":"1"}}\n{"a":1}\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const line = '{"index":{"_id":"x"}}\n{"title":"Some document"}\n';
      const filePath = writeTempFile('read-large.njson', line.repeat(200));
      const source = new FilePathSource(filePath, { highWaterMark: 1024 });

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.join('')).toBe(line.repeat(200));
    });

    it('should reject when the file does not exist', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'missing.njson'));

      await expect(async () => {
        for await (const _chunk of source.read()) {
          // consume
        }
      }).rejects.toThrow('ENOENT');
    });
  });

  describe('metadata()', () => {
    it('should return file name and size', () => {
      const filePath = writeTempFile('meta.njson', 'k\nd\n');

      expect(new FilePathSource(filePath).metadata()).toEqual({ fileName: 'meta.njson', fileSize: 4 });
    });
  });
});
