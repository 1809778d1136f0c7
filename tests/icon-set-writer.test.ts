/**
 * Tests for writing the AppIcon asset catalog to disk.
 * Each test works in its own temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { buildIconSetContents } from '../src/shared/icon-manifest';
import { renderIcon } from '../src/shared/icon-renderer';
import { iconFilename, uniquePixelSizes } from '../src/shared/icon-sizes';
import { generateIconSet, IconSetError } from '../src/shared/icon-set-writer';

describe('generateIconSet', () => {
  let tmpDir: string;
  let outputDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-icons-'));
    outputDir = path.join(tmpDir, 'Shared', 'Resources', 'Assets.xcassets', 'AppIcon.appiconset');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes one PNG per unique pixel size plus Contents.json', async () => {
    const onIconWritten = vi.fn();
    const result = await generateIconSet({ outputDir, onIconWritten });

    const expectedFiles = uniquePixelSizes().map(iconFilename);
    expect(result.files).toEqual(expectedFiles);
    expect(result.files).toHaveLength(19);
    expect(result.outputDir).toBe(outputDir);
    expect(result.manifestPath).toBe(path.join(outputDir, 'Contents.json'));

    expect(fs.readdirSync(outputDir).sort()).toEqual([...expectedFiles, 'Contents.json'].sort());

    expect(onIconWritten).toHaveBeenCalledTimes(19);
    expect(onIconWritten).toHaveBeenNthCalledWith(1, 'icon_20x20.png', 20);
    expect(onIconWritten).toHaveBeenLastCalledWith('icon_512x512.png', 512);
  });

  it('writes the manifest as indented JSON', async () => {
    const { manifestPath } = await generateIconSet({ outputDir });

    const raw = fs.readFileSync(manifestPath, 'utf-8');
    expect(raw).toBe(JSON.stringify(buildIconSetContents(), null, 2) + '\n');
    expect(raw.startsWith('{\n  "images": [\n    {\n      "size": "20x20",')).toBe(true);
  });

  it('every manifest filename exists on disk', async () => {
    const { manifestPath } = await generateIconSet({ outputDir });
    const contents = buildIconSetContents();

    for (const image of contents.images) {
      expect(fs.existsSync(path.join(outputDir, image.filename))).toBe(true);
    }
    expect(fs.existsSync(manifestPath)).toBe(true);
  });

  it('sizes each PNG to its filename', async () => {
    await generateIconSet({ outputDir });

    for (const size of [20, 167, 180, 1024]) {
      const meta = await sharp(path.join(outputDir, iconFilename(size))).metadata();
      expect([meta.width, meta.height]).toEqual([size, size]);
    }
  });

  it('overwrites earlier output with identical files', async () => {
    await generateIconSet({ outputDir });
    const firstRun = new Map(
      fs.readdirSync(outputDir).map(name => [name, fs.readFileSync(path.join(outputDir, name))]),
    );

    fs.writeFileSync(path.join(outputDir, 'icon_20x20.png'), 'stale');
    await generateIconSet({ outputDir });

    for (const [name, bytes] of firstRun) {
      expect(fs.readFileSync(path.join(outputDir, name)).equals(bytes)).toBe(true);
    }
    expect(fs.readFileSync(path.join(outputDir, 'icon_20x20.png')).equals(await renderIcon(20))).toBe(true);
  });

  it('refuses to write a manifest that points at unrendered icons', async () => {
    const run = generateIconSet({
      outputDir,
      sizes: [{ points: 16, scale: 1 }],
      slots: [
        { points: 16, idiom: 'mac', scale: 1 },
        { points: 16, idiom: 'mac', scale: 2 },
      ],
    });

    await expect(run).rejects.toBeInstanceOf(IconSetError);
    await expect(run).rejects.toMatchObject({ missingFiles: ['icon_32x32.png'] });
    expect(fs.existsSync(path.join(outputDir, 'icon_16x16.png'))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, 'Contents.json'))).toBe(false);
  });

  it('aborts when the output directory cannot be created', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');

    await expect(generateIconSet({ outputDir: path.join(blocker, 'icons') })).rejects.toThrow();
  });
});
