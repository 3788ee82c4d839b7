import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ImageResolver } from './image-resolver.js';

describe('ImageResolver', () => {
  let root: string;
  let first: string;
  let second: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'docforge-images-'));
    first = path.join(root, 'first');
    second = path.join(root, 'second');
    await mkdir(path.join(second, 'img'), { recursive: true });
    await mkdir(first, { recursive: true });
    await writeFile(path.join(second, 'img', 'chart.png'), 'png');
    await writeFile(path.join(first, 'shared.png'), 'png');
    await writeFile(path.join(second, 'shared.png'), 'png');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('tries each search path in order', async () => {
    const resolver = new ImageResolver({ searchPaths: [first, second] });
    expect(await resolver.resolve('img/chart.png')).toBe(path.join(second, 'img', 'chart.png'));
    expect(await resolver.resolve('shared.png')).toBe(path.join(first, 'shared.png'));
  });

  it('strips a leading ./', async () => {
    const resolver = new ImageResolver({ searchPaths: [second] });
    expect(await resolver.resolve('./img/chart.png')).toBe(path.join(second, 'img', 'chart.png'));
  });

  it('accepts absolute paths only when the file exists', async () => {
    const resolver = new ImageResolver({ searchPaths: [first] });
    const absolute = path.join(second, 'img', 'chart.png');
    expect(await resolver.resolve(absolute)).toBe(absolute);
    expect(await resolver.resolve(path.join(root, 'nope.png'))).toBeUndefined();
  });

  it('does not treat directories or remote urls as images', async () => {
    const resolver = new ImageResolver({ searchPaths: [second] });
    expect(await resolver.resolve('img')).toBeUndefined();
    expect(await resolver.resolve('https://example.com/chart.png')).toBeUndefined();
    expect(await resolver.resolve('data:image/png;base64,AAAA')).toBeUndefined();
  });

  it('resolveAll keeps only resolved urls', async () => {
    const resolver = new ImageResolver({ searchPaths: [first, second] });
    const resolved = await resolver.resolveAll(['shared.png', 'missing.png', 'shared.png']);
    expect([...resolved.entries()]).toEqual([['shared.png', path.join(first, 'shared.png')]]);
  });
});
