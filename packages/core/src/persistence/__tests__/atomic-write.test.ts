/**
 * Atomic Write Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeFileAtomicSync } from '../atomic-write.js';
import { PersistenceError } from '../persistence-errors.js';

describe('writeFileAtomicSync', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'spendbook-atomic-'));
    filePath = join(dir, 'expenses.txt');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should replace existing contents and leave no temp file', () => {
    writeFileSync(filePath, 'old\n');

    writeFileAtomicSync(filePath, 'new\n');

    expect(readFileSync(filePath, 'utf8')).toBe('new\n');
    expect(readdirSync(dir)).toEqual(['expenses.txt']);
  });

  it('should create missing parent directories', () => {
    const nested = join(dir, 'a', 'b', 'expenses.txt');

    writeFileAtomicSync(nested, 'x');

    expect(readFileSync(nested, 'utf8')).toBe('x');
  });

  it('should keep the previous contents when the temp file cannot be created', () => {
    // Arrange
    const original = 'date,category,amount,description\n2024-01-01,Food,10,a\n';
    writeFileSync(filePath, original);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    mkdirSync(tempPath);

    // Act & Assert
    expect(() => writeFileAtomicSync(filePath, 'replacement\n')).toThrow(PersistenceError);
    expect(readFileSync(filePath, 'utf8')).toBe(original);
    expect(readdirSync(dir).sort()).toEqual(['expenses.txt', `expenses.txt.${process.pid}.tmp`]);
    expect(statSync(tempPath).isDirectory()).toBe(true);
  });

  it('should remove its temp file when the final rename fails', () => {
    // Arrange
    mkdirSync(filePath);
    writeFileSync(join(filePath, 'keep'), 'stored');

    // Act & Assert
    expect(() => writeFileAtomicSync(filePath, 'replacement\n')).toThrow(
      `Failed to write ${filePath}`
    );
    expect(readdirSync(dir)).toEqual(['expenses.txt']);
    expect(readFileSync(join(filePath, 'keep'), 'utf8')).toBe('stored');
  });

  it('should carry the path and cause on failure', () => {
    mkdirSync(`${filePath}.${process.pid}.tmp`);

    let caught: unknown;
    try {
      writeFileAtomicSync(filePath, 'x');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PersistenceError);
    expect(caught instanceof PersistenceError && caught.path).toBe(filePath);
    expect(caught instanceof PersistenceError && caught.cause).toBeInstanceOf(Error);
  });
});
