import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileService } from './FileService.js';

describe('FileService', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'noise-export-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('writes a CSV file below a nested export directory', async () => {
    const service = new FileService(path.join(rootDir, 'exports', 'hourly'));

    const filePath = await service.writeCsv('42-hourly', 'timestamp,mean\n');

    expect(filePath).toBe(path.join(rootDir, 'exports', 'hourly', '42-hourly.csv'));
    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe('timestamp,mean\n');
  });

  it('keeps path separators out of the file name', async () => {
    const service = new FileService(rootDir);

    const filePath = await service.writeCsv('a/b', 'x\n');

    expect(path.basename(filePath)).toBe('a_b.csv');
  });
});
