import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { collectImagePaths, discoverItems, parseResponseFileContent } from './ItemDiscovery';
import { createItem, sequenceFromPaths } from './ItemSequence';

describe('ItemSequence', () => {
  it('SEQ-001: createItem splits name, base name and extension', () => {
    const item = createItem('photos/cat.final.JPG', { cwd: '/data' });
    expect(item.name).toBe('cat.final.JPG');
    expect(item.baseName).toBe('cat.final');
    expect(item.extension).toBe('.JPG');
    expect(item.absolutePath).toBe(path.resolve('/data', 'photos/cat.final.JPG'));
  });

  it('SEQ-002: sequences are frozen', () => {
    const seq = sequenceFromPaths(['a.png', 'b.png']);
    expect(Object.isFrozen(seq)).toBe(true);
    expect(Object.isFrozen(seq[0])).toBe(true);
  });
});

describe('ItemDiscovery', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'discovery-'));
    await fs.mkdir(path.join(dir, 'sub'));
    await fs.writeFile(path.join(dir, 'b.png'), 'bb');
    await fs.writeFile(path.join(dir, 'a.JPG'), 'a');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'x');
    await fs.writeFile(path.join(dir, 'skip_me.png'), 'x');
    await fs.writeFile(path.join(dir, 'sub', 'c.gif'), 'ccc');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('DISC-001: lists images in a directory sorted, case-insensitive extensions', async () => {
    const found = await collectImagePaths(['.'], { cwd: dir });
    expect(found).toEqual(['a.JPG', 'b.png', 'skip_me.png']);
  });

  it('DISC-002: recursion includes subdirectories', async () => {
    const found = await collectImagePaths(['.'], { cwd: dir, recursive: true });
    expect(found).toEqual(['a.JPG', 'b.png', 'skip_me.png', path.join('sub', 'c.gif')]);
  });

  it('DISC-003: exclude patterns match file names', async () => {
    const found = await collectImagePaths(['.'], { cwd: dir, exclude: ['skip_*'] });
    expect(found).toEqual(['a.JPG', 'b.png']);
  });

  it('DISC-004: duplicates are removed keeping the first occurrence', async () => {
    const found = await collectImagePaths(['b.png', '.', './b.png'], { cwd: dir });
    expect(found).toEqual(['b.png', 'a.JPG', 'skip_me.png']);
  });

  it('DISC-005: response files list paths, skipping comments and blanks', async () => {
    await fs.writeFile(
      path.join(dir, 'list.txt'),
      '# favourites\n\nsub/c.gif\nnotes.txt\nmissing.png\nb.png\n'
    );
    const found = await collectImagePaths(['@list.txt'], { cwd: dir });
    expect(found).toEqual(['sub/c.gif', 'b.png']);
  });

  it('DISC-006: missing paths and non-images are skipped', async () => {
    const found = await collectImagePaths(['nope', 'notes.txt', 'a.JPG'], { cwd: dir });
    expect(found).toEqual(['a.JPG']);
  });

  it('DISC-007: extra extensions are accepted with or without a dot', async () => {
    await fs.writeFile(path.join(dir, 'raw.heic'), 'x');
    const found = await collectImagePaths(['raw.heic'], { cwd: dir, extraExtensions: ['heic'] });
    expect(found).toEqual(['raw.heic']);
  });

  it('DISC-008: discoverItems captures file sizes', async () => {
    const seq = await discoverItems(['.'], { cwd: dir, recursive: true });
    expect(seq.map((i) => i.sizeBytes)).toEqual([1, 2, 1, 3]);
    expect(seq[3]?.absolutePath).toBe(path.join(dir, 'sub', 'c.gif'));
  });

  it('DISC-009: parseResponseFileContent trims lines', () => {
    expect(parseResponseFileContent('  a.png  \r\n#x\n\n b.png')).toEqual(['a.png', 'b.png']);
  });
});
