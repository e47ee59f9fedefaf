import { readFile, writeFile } from 'node:fs/promises';

import { JsonFileError } from '../trait/errors';
import { isCardRecord, isTraitEntry, type CardRecord, type TraitEntry } from '../trait/types';

async function readJsonArray(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new JsonFileError(filePath, `Invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  if (!Array.isArray(parsed)) {
    throw new JsonFileError(filePath, 'Expected a JSON array');
  }
  return parsed;
}

/**
 * 팩 파일(카드 배열)을 읽는다. 각 카드 객체는 원본 그대로 반환되어 키 순서가 유지된다.
 */
export async function readCardFile(filePath: string): Promise<CardRecord[]> {
  const items = await readJsonArray(filePath);
  return items.map((item, i) => {
    if (!isCardRecord(item)) {
      throw new JsonFileError(filePath, `Item ${i} is not a card record`);
    }
    return item;
  });
}

/**
 * traits 사전 파일(`{code, name}` 배열)을 읽는다.
 */
export async function readTraitFile(filePath: string): Promise<TraitEntry[]> {
  const items = await readJsonArray(filePath);
  return items.map((item, i) => {
    if (!isTraitEntry(item)) {
      throw new JsonFileError(filePath, `Item ${i} is not a trait entry`);
    }
    return { code: item.code, name: item.name };
  });
}

/**
 * 들여쓰기한 JSON을 UTF-8로 기록한다. 비 ASCII 문자는 이스케이프하지 않으며 마지막 줄바꿈은 붙이지 않는다.
 */
export async function writeJsonFile(filePath: string, data: unknown, indent: number): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, indent), 'utf-8');
}
