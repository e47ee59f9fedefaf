import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  updateTraits,
  MissingTraitTranslationError,
  TraitsFileNotFoundError,
  DirectoryNotFoundError,
} from '../../index';
import { createTestContext, type TestContext } from '../helpers';

const KO_TRAITS = [
  { code: 'Item', name: '아이템' },
  { code: 'Tome', name: '서적' },
  { code: 'Weapon', name: '무기' },
];

async function seed(tc: TestContext, en: unknown[], ko: unknown[], file = 'core/core.json') {
  await tc.writeJson(`pack/${file}`, en);
  await tc.writeJson(`translations/ko/pack/${file}`, ko);
  await tc.writeJson('translations/ko/traits.json', KO_TRAITS);
}

describe('updateTraits', () => {
  let tc: TestContext;

  afterEach(async () => {
    await tc?.cleanup();
  });

  it('should translate traits that still match the English source', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [{ code: '01001', traits: 'Item. Weapon.' }],
      [{ code: '01001', name: '45구경 자동권총', traits: 'Item. Weapon.' }],
    );
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result.written).toEqual([join('core', 'core.json')]);
    expect(result.files[0]?.changed).toEqual(['01001']);
    expect(await tc.readJson('translations/ko/pack/core/core.json')).toEqual([
      { code: '01001', name: '45구경 자동권총', traits: '아이템. 무기.' },
    ]);
  });

  it('should preserve the key order of rewritten cards', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [{ code: '01001', traits: 'Item.' }],
      [{ traits: 'Item.', code: '01001', text: '본문' }],
    );
    // Act
    await updateTraits(tc.ctx, 'ko');
    // Assert
    const text = await tc.readText('translations/ko/pack/core/core.json');
    expect(text).toBe(
      '[\n    {\n        "traits": "아이템.",\n        "code": "01001",\n        "text": "본문"\n    }\n]',
    );
  });

  it('should skip cards whose traits differ from English when overwrite is off', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [{ code: '01001', traits: 'Item. Weapon.' }],
      [{ code: '01001', traits: '손수 번역.' }],
    );
    const path = join(tc.rootDir, 'translations/ko/pack/core/core.json');
    const before = await readFile(path, 'utf-8');
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result.files[0]?.skipped).toEqual(['01001']);
    expect(result.written).toEqual([]);
    expect(await readFile(path, 'utf-8')).toBe(before);
  });

  it('should recompute translated cards when overwrite is on', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [{ code: '01001', traits: 'Item. Tome.' }],
      [{ code: '01001', traits: '손수 번역.' }],
    );
    // Act
    await updateTraits(tc.ctx, 'ko', { overwrite: true });
    // Assert
    expect(await tc.readJson('translations/ko/pack/core/core.json')).toEqual([
      { code: '01001', traits: '아이템. 서적.' },
    ]);
  });

  it('should leave cards without traits or without an English counterpart untouched', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [{ code: '01001', traits: 'Item.' }],
      [
        { code: '01001', traits: 'Item.' },
        { code: '01002', name: 'no traits' },
        { code: '99999', traits: 'Item.' },
      ],
    );
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result.files[0]).toEqual({ file: join('core', 'core.json'), changed: ['01001'], skipped: [] });
    expect(await tc.readJson('translations/ko/pack/core/core.json')).toEqual([
      { code: '01001', traits: '아이템.' },
      { code: '01002', name: 'no traits' },
      { code: '99999', traits: 'Item.' },
    ]);
  });

  it('should not rewrite a file when nothing changed', async () => {
    // Arrange
    tc = await createTestContext();
    await tc.writeJson('pack/core/core.json', [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('translations/ko/pack/core/core.json', [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('translations/ko/traits.json', [{ code: 'Item', name: 'Item' }]);
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result.files[0]?.changed).toEqual([]);
    expect(result.written).toEqual([]);
  });

  it('should use the first English record when a code appears twice', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(
      tc,
      [
        { code: '01001', traits: 'Item.' },
        { code: '01001', traits: 'Weapon.' },
      ],
      [{ code: '01001', traits: 'Item.' }],
    );
    // Act
    await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(await tc.readJson('translations/ko/pack/core/core.json')).toEqual([
      { code: '01001', traits: '아이템.' },
    ]);
  });

  it('should keep translated traits when the English record has none, even with overwrite on', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(tc, [{ code: '01001' }], [{ code: '01001', traits: '아이템.' }]);
    const path = join(tc.rootDir, 'translations/ko/pack/core/core.json');
    const before = await readFile(path, 'utf-8');
    // Act
    const result = await updateTraits(tc.ctx, 'ko', { overwrite: true });
    // Assert
    expect(result.files[0]).toEqual({ file: join('core', 'core.json'), changed: [], skipped: [] });
    expect(result.written).toEqual([]);
    expect(await readFile(path, 'utf-8')).toBe(before);
  });

  it('should process a cycle once when it is requested twice', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(tc, [{ code: '01001', traits: 'Item.' }], [{ code: '01001', traits: 'Item.' }]);
    // Act
    const result = await updateTraits(tc.ctx, 'ko', { cycles: ['core', 'core'] });
    // Assert
    expect(result.files.map((f) => f.file)).toEqual([join('core', 'core.json')]);
    expect(result.written).toEqual([join('core', 'core.json')]);
  });

  it('should ignore translated files that have no English counterpart', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(tc, [{ code: '01001', traits: 'Item.' }], [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('translations/ko/pack/core/orphan.json', [{ code: '01001', traits: 'Item.' }]);
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result.files.map((f) => f.file)).toEqual([join('core', 'core.json')]);
    expect(await tc.readJson('translations/ko/pack/core/orphan.json')).toEqual([
      { code: '01001', traits: 'Item.' },
    ]);
  });

  it('should only touch the requested cycles', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(tc, [{ code: '01001', traits: 'Item.' }], [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('pack/dwl/dwl.json', [{ code: '02001', traits: 'Tome.' }]);
    await tc.writeJson('translations/ko/pack/dwl/dwl.json', [{ code: '02001', traits: 'Tome.' }]);
    // Act
    const result = await updateTraits(tc.ctx, 'ko', { cycles: ['dwl'] });
    // Assert
    expect(result.written).toEqual([join('dwl', 'dwl.json')]);
    expect(await tc.readJson('translations/ko/pack/core/core.json')).toEqual([
      { code: '01001', traits: 'Item.' },
    ]);
    expect(await tc.readJson('translations/ko/pack/dwl/dwl.json')).toEqual([
      { code: '02001', traits: '서적.' },
    ]);
  });

  it('should be a no-op when there are no translated pack files', async () => {
    // Arrange
    tc = await createTestContext();
    await tc.writeJson('translations/ko/traits.json', KO_TRAITS);
    await tc.writeJson('translations/ko/pack/core/.keep.txt', '');
    // Act
    const result = await updateTraits(tc.ctx, 'ko');
    // Assert
    expect(result).toEqual({ files: [], written: [] });
  });

  it('should abort without writing any file when a trait has no translation', async () => {
    // Arrange
    tc = await createTestContext();
    await tc.writeJson('translations/ko/traits.json', KO_TRAITS);
    await tc.writeJson('pack/core/a.json', [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('translations/ko/pack/core/a.json', [{ code: '01001', traits: 'Item.' }]);
    await tc.writeJson('pack/core/b.json', [{ code: '01002', traits: 'Relic.' }]);
    await tc.writeJson('translations/ko/pack/core/b.json', [{ code: '01002', traits: 'Relic.' }]);
    // Act
    const run = updateTraits(tc.ctx, 'ko');
    // Assert
    await expect(run).rejects.toThrow(MissingTraitTranslationError);
    expect(await tc.readJson('translations/ko/pack/core/a.json')).toEqual([
      { code: '01001', traits: 'Item.' },
    ]);
  });

  it('should report the missing trait code on the error', async () => {
    // Arrange
    tc = await createTestContext();
    await seed(tc, [{ code: '01001', traits: 'Relic.' }], [{ code: '01001', traits: 'Relic.' }]);
    // Act
    const error = await updateTraits(tc.ctx, 'ko').catch((e: unknown) => e);
    // Assert
    expect(error).toBeInstanceOf(MissingTraitTranslationError);
    if (error instanceof MissingTraitTranslationError) {
      expect(error.traitCode).toBe('Relic');
      expect(error.language).toBe('ko');
    }
  });

  it('should throw TraitsFileNotFoundError when the language dictionary is missing', async () => {
    // Arrange
    tc = await createTestContext();
    await tc.writeJson('pack/core/core.json', []);
    await tc.writeJson('translations/ko/pack/core/core.json', []);
    // Act / Assert
    await expect(updateTraits(tc.ctx, 'ko')).rejects.toThrow(TraitsFileNotFoundError);
  });

  it('should throw DirectoryNotFoundError when the translated pack tree is missing', async () => {
    // Arrange
    tc = await createTestContext();
    await tc.writeJson('translations/ko/traits.json', KO_TRAITS);
    // Act / Assert
    await expect(updateTraits(tc.ctx, 'ko')).rejects.toThrow(DirectoryNotFoundError);
  });
});
