import { join } from 'node:path';

import { languagePackDir, languageTraitsPath, type CardtraitContext } from '../config';
import { mergeTraits, splitTraits } from '../trait/codec';
import { MissingTraitTranslationError, TraitsFileNotFoundError } from '../trait/errors';
import type { CardRecord } from '../trait/types';
import { getJsonFiles, isFile } from '../fs/json-files';
import { readCardFile, readTraitFile, writeJsonFile } from '../fs/json-io';

export interface UpdateTraitsOptions {
  /** 대상 cycle. 미지정 또는 빈 배열이면 전체 */
  cycles?: readonly string[];
  /** true면 이미 번역된(영문과 다른) traits도 다시 계산한다. 기본값: false */
  overwrite?: boolean;
}

export interface PackTraitsChange {
  /** 팩 디렉토리 기준 상대 경로 */
  file: string;
  /** traits 문자열이 바뀐 카드 코드 */
  changed: string[];
  /** 이미 번역되어 있어 건너뛴 카드 코드 */
  skipped: string[];
}

export interface UpdateTraitsResult {
  /** 영문 대응 파일이 있는 번역 팩 파일별 결과 */
  files: PackTraitsChange[];
  /** 실제로 다시 기록된 파일 (상대 경로) */
  written: string[];
}

interface PlannedWrite {
  path: string;
  cards: CardRecord[];
}

function indexByCode(cards: readonly CardRecord[]): Map<string, CardRecord> {
  const index = new Map<string, CardRecord>();
  for (const card of cards) {
    if (!index.has(card.code)) index.set(card.code, card);
  }
  return index;
}

/**
 * 영문 카드의 traits를 언어별 사전으로 번역해 번역 카드 파일에 반영한다.
 *
 * 모든 파일의 변경을 먼저 계산한 뒤 마지막에 기록한다. 사전에 없는 trait가 하나라도 있으면
 * 전체 실행이 중단되고 어떤 파일도 기록되지 않는다. 대상 파일이 없으면 아무 것도 하지 않는다.
 *
 * @throws {TraitsFileNotFoundError} 언어별 traits 사전이 없을 때.
 * @throws {DirectoryNotFoundError} 번역 팩 디렉토리 또는 지정한 cycle이 없을 때.
 * @throws {MissingTraitTranslationError} 사전에 없는 trait 코드를 만났을 때.
 */
export async function updateTraits(
  ctx: CardtraitContext,
  language: string,
  options: UpdateTraitsOptions = {},
): Promise<UpdateTraitsResult> {
  const overwrite = options.overwrite ?? false;

  const dictPath = languageTraitsPath(ctx, language);
  if (!(await isFile(dictPath))) {
    throw new TraitsFileNotFoundError(dictPath);
  }
  const dictionary = new Map<string, string>();
  for (const entry of await readTraitFile(dictPath)) {
    dictionary.set(entry.code, entry.name);
  }

  const transPackDir = languagePackDir(ctx, language);
  const candidates = await getJsonFiles(transPackDir, options.cycles);
  const files: string[] = [];
  for (const file of candidates) {
    if (await isFile(join(ctx.packDir, file))) files.push(file);
  }

  const results: PackTraitsChange[] = [];
  const planned: PlannedWrite[] = [];

  for (const file of files) {
    const english = indexByCode(await readCardFile(join(ctx.packDir, file)));
    const transPath = join(transPackDir, file);
    const cards = await readCardFile(transPath);
    const change: PackTraitsChange = { file, changed: [], skipped: [] };

    for (const card of cards) {
      if (card.traits === undefined) continue;
      const source = english.get(card.code);
      // 영문에 traits가 없으면 번역 쪽 값을 지우지 않고 그대로 둔다
      if (!source || source.traits === undefined) continue;

      const sourceTraits = source.traits;
      if (!overwrite && card.traits !== sourceTraits) {
        change.skipped.push(card.code);
        continue;
      }

      const translated = splitTraits(sourceTraits).map((trait) => {
        const name = dictionary.get(trait);
        if (name === undefined) {
          throw new MissingTraitTranslationError(language, trait, file);
        }
        return name;
      });
      const next = mergeTraits(translated);
      if (next !== card.traits) {
        card.traits = next;
        change.changed.push(card.code);
      }
    }

    results.push(change);
    if (change.changed.length > 0) {
      planned.push({ path: transPath, cards });
    }
  }

  for (const write of planned) {
    await writeJsonFile(write.path, write.cards, ctx.indent);
  }

  return {
    files: results,
    written: results.filter((r) => r.changed.length > 0).map((r) => r.file),
  };
}
