import { join } from 'node:path';

import { languageDir, languageTraitsPath, type CardtraitContext } from '../config';
import { splitTraits } from '../trait/codec';
import { LanguageNotFoundError, TraitsFileNotFoundError } from '../trait/errors';
import { compareTraitEntries, type TraitEntry } from '../trait/types';
import { getJsonFiles, isDirectory, isFile } from '../fs/json-files';
import { readCardFile, readTraitFile, writeJsonFile } from '../fs/json-io';

export interface MakePlaceholderResult {
  /** 기록된 마스터 목록 (code 정렬, `name === code`) */
  entries: TraitEntry[];
  /** 스캔한 영문 팩 파일 수 */
  scannedFiles: number;
}

export interface UpdatePlaceholderResult {
  /** 이번 실행에서 새로 추가된 trait 코드 */
  added: string[];
  /** 기록 후 언어별 사전의 전체 항목 수 */
  total: number;
}

/**
 * 영문 팩 전체에서 trait를 모아 마스터 traits 파일을 다시 만든다.
 * 이전 마스터 파일 내용은 참고하지 않는다 (전체 재계산).
 */
export async function makePlaceholder(ctx: CardtraitContext): Promise<MakePlaceholderResult> {
  const files = await getJsonFiles(ctx.packDir);
  const traits = new Set<string>();

  for (const file of files) {
    const cards = await readCardFile(join(ctx.packDir, file));
    for (const card of cards) {
      if (card.traits === undefined) continue;
      for (const trait of splitTraits(card.traits)) {
        traits.add(trait);
      }
    }
  }

  const entries: TraitEntry[] = [...traits].sort().map((code) => ({ code, name: code }));
  await writeJsonFile(ctx.masterTraitsPath, entries, ctx.indent);

  return { entries, scannedFiles: files.length };
}

/**
 * 마스터 traits 파일의 새 항목을 언어별 사전에 추가한다.
 * 이미 있는 코드는 번역된 이름을 그대로 두고, 없는 코드만 영문 이름으로 채운다.
 *
 * @throws {TraitsFileNotFoundError} 마스터 traits 파일이 없을 때.
 * @throws {LanguageNotFoundError} `translations/<language>` 디렉토리가 없을 때.
 */
export async function updatePlaceholder(
  ctx: CardtraitContext,
  language: string,
): Promise<UpdatePlaceholderResult> {
  if (!(await isFile(ctx.masterTraitsPath))) {
    throw new TraitsFileNotFoundError(ctx.masterTraitsPath);
  }
  if (!(await isDirectory(languageDir(ctx, language)))) {
    throw new LanguageNotFoundError(language);
  }

  const targetPath = languageTraitsPath(ctx, language);
  const existing = (await isFile(targetPath)) ? await readTraitFile(targetPath) : [];
  const knownCodes = new Set(existing.map((e) => e.code));

  const added: string[] = [];
  const merged = [...existing];
  for (const entry of await readTraitFile(ctx.masterTraitsPath)) {
    if (knownCodes.has(entry.code)) continue;
    knownCodes.add(entry.code);
    merged.push({ code: entry.code, name: entry.name });
    added.push(entry.code);
  }

  merged.sort(compareTraitEntries);
  await writeJsonFile(targetPath, merged, ctx.indent);

  return { added, total: merged.length };
}
