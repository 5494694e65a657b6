/**
 * @fileoverview Tests for file helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ensureDir, isMissingFileError, readTextFile, resolveFrom, writeTextFile } from '../src/io-helper.js';
import { createTempProject, type TempProject } from './helpers.js';

describe('io-helper', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  describe('writeTextFile', () => {
    it('should create parent directories and write the content', async () => {
      const target = project.path('deep/nested/out.txt');

      await writeTextFile(target, 'hello\n');

      expect(readFileSync(target, 'utf-8')).toBe('hello\n');
    });

    it('should replace an existing file and leave no temp file behind', async () => {
      const target = project.write('out.txt', 'old');

      await writeTextFile(target, 'new');

      expect(readFileSync(target, 'utf-8')).toBe('new');
      expect(readdirSync(project.dir)).toEqual(['out.txt']);
    });

    it('should reject when the target is a directory', async () => {
      project.write('taken/file.txt', 'x');

      await expect(writeTextFile(project.path('taken'), 'content')).rejects.toBeInstanceOf(Error);
      expect(readdirSync(project.dir)).toEqual(['taken']);
    });
  });

  describe('readTextFile', () => {
    it('should read UTF-8 text', async () => {
      const path = project.write('in.txt', 'héllo {name}');

      expect(await readTextFile(path)).toBe('héllo {name}');
    });
  });

  describe('ensureDir', () => {
    it('should create a directory tree once', () => {
      const dir = project.path('a/b/c');

      ensureDir(dir);
      ensureDir(dir);

      expect(existsSync(dir)).toBe(true);
    });
  });

  describe('resolveFrom', () => {
    it('should resolve relative paths against the base directory', () => {
      expect(resolveFrom('/base/dir', 'out/file.txt')).toBe(resolve('/base/dir', 'out/file.txt'));
    });

    it('should keep absolute paths', () => {
      const absolute = join(project.dir, 'x.txt');
      expect(resolveFrom('/elsewhere', absolute)).toBe(absolute);
    });
  });

  describe('isMissingFileError', () => {
    it('should recognise ENOENT errors', async () => {
      const err: unknown = await readTextFile(project.path('missing')).catch((e: unknown) => e);

      expect(isMissingFileError(err)).toBe(true);
    });

    it('should reject other values', () => {
      expect(isMissingFileError(new Error('plain'))).toBe(false);
      expect(isMissingFileError('ENOENT')).toBe(false);
    });
  });
});
