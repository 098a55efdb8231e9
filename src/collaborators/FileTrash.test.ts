import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileTrash, trashTimestamp } from './FileTrash';
import { FileRecordLog } from './FileRecordLog';
import { CollaboratorError } from '../core/errors';

describe('FileTrash', () => {
  let dir: string;
  let trash: FileTrash;
  const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trash-'));
    trash = new FileTrash(path.join(dir, '.trash'), fixedNow);
    await fs.writeFile(path.join(dir, 'photo.png'), 'pixels');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('TR-001: trashTimestamp formats local time', () => {
    expect(trashTimestamp(fixedNow())).toBe('20240102_030405');
  });

  it('TR-002: trash moves the file and records its origin', async () => {
    const receipt = await trash.trash(path.join(dir, 'photo.png'));
    expect(receipt.trashName).toBe('20240102_030405_1_photo.png');
    expect(receipt.originalPath).toBe(path.join(dir, 'photo.png'));
    await expect(fs.access(path.join(dir, 'photo.png'))).rejects.toThrow();
    expect(await fs.readFile(receipt.trashPath, 'utf8')).toBe('pixels');

    const manifest = JSON.parse(await fs.readFile(path.join(dir, '.trash', 'manifest.json'), 'utf8'));
    expect(manifest[receipt.trashName]).toEqual({
      original_path: path.join(dir, 'photo.png'),
      deleted_at: '20240102_030405',
      original_name: 'photo.png',
      size: 6,
    });
  });

  it('TR-003: restore moves the file back', async () => {
    const receipt = await trash.trash(path.join(dir, 'photo.png'));
    const restored = await trash.restore(receipt);
    expect(restored).toBe(path.join(dir, 'photo.png'));
    expect(await fs.readFile(restored, 'utf8')).toBe('pixels');
    expect(await trash.list()).toEqual([]);
  });

  it('TR-004: restore avoids overwriting a file that reappeared', async () => {
    const receipt = await trash.trash(path.join(dir, 'photo.png'));
    await fs.writeFile(path.join(dir, 'photo.png'), 'new');
    const restored = await trash.restore(receipt);
    expect(restored).toBe(path.join(dir, 'photo_restored_1.png'));
    expect(await fs.readFile(path.join(dir, 'photo.png'), 'utf8')).toBe('new');
  });

  it('TR-005: manifest survives a new instance', async () => {
    const receipt = await trash.trash(path.join(dir, 'photo.png'));
    const reopened = new FileTrash(path.join(dir, '.trash'));
    const items = await reopened.list();
    expect(items).toHaveLength(1);
    expect(items[0]?.trash_name).toBe(receipt.trashName);
    expect(items[0]?.exists).toBe(true);
  });

  it('TR-006: trashing a missing file is a collaborator error', async () => {
    await expect(trash.trash(path.join(dir, 'missing.png'))).rejects.toBeInstanceOf(CollaboratorError);
  });

  it('TR-007: restoring an unknown receipt fails', async () => {
    await expect(
      trash.restore({ trashName: 'nope', originalPath: '/x', trashPath: '/y' })
    ).rejects.toThrow('nope is not in the trash');
  });

  it('TR-008: empty removes everything', async () => {
    await trash.trash(path.join(dir, 'photo.png'));
    expect(await trash.empty()).toBe(1);
    expect(await trash.list()).toEqual([]);
  });
});

describe('FileRecordLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'records-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('RL-001: appends to the file, creating directories', async () => {
    const log = new FileRecordLog(path.join(dir, 'nested', 'remember.txt'));
    await log.append('one\n');
    await log.append('two\n');
    expect(await fs.readFile(log.location, 'utf8')).toBe('one\ntwo\n');
  });

  it('RL-002: an unwritable target surfaces a collaborator error', async () => {
    await fs.mkdir(path.join(dir, 'taken'));
    const log = new FileRecordLog(path.join(dir, 'taken'));
    await expect(log.append('x')).rejects.toBeInstanceOf(CollaboratorError);
  });
});
