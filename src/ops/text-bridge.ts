import { readFile, writeFile } from 'node:fs/promises';

import { TextBridgeParseError } from '../trait/errors';
import { compareTraitEntries, type TraitEntry } from '../trait/types';
import { readTraitFile, writeJsonFile } from '../fs/json-io';
import { DEFAULT_INDENT } from '../config';

export interface TextToJsonResult {
  /** 이름이 텍스트 파일 값으로 갱신된 코드 (값이 같아도 포함) */
  updated: string[];
  /** JSON에 없어 무시된 코드 */
  ignored: string[];
}

/**
 * traits 사전을 번역 작업용 텍스트로 내보낸다.
 * 형식: 항목마다 `code<TAB>name\n`, 파일 순서 유지, 헤더 없음.
 */
export async function jsonToText(jsonPath: string, textPath: string): Promise<number> {
  const entries = await readTraitFile(jsonPath);
  const text = entries.map((e) => `${e.code}\t${e.name}\n`).join('');
  await writeFile(textPath, text, 'utf-8');
  return entries.length;
}

/**
 * 번역 작업이 끝난 텍스트를 traits 사전에 반영한다.
 *
 * JSON에 이미 있는 코드의 이름만 바꾸며, 모르는 코드는 무시한다.
 * 결과는 code(같으면 name) 순으로 정렬해 다시 기록한다.
 *
 * @throws {TextBridgeParseError} 비어 있지 않은 줄에 탭이 없을 때. 이 경우 JSON은 기록되지 않는다.
 */
export async function textToJson(
  jsonPath: string,
  textPath: string,
  indent: number = DEFAULT_INDENT,
): Promise<TextToJsonResult> {
  const names = new Map<string, string>();
  for (const entry of await readTraitFile(jsonPath)) {
    names.set(entry.code, entry.name);
  }

  const updated: string[] = [];
  const ignored: string[] = [];
  const lines = (await readFile(textPath, 'utf-8')).split('\n');

  lines.forEach((line, i) => {
    if (line.trim() === '') return;
    const tab = line.indexOf('\t');
    if (tab < 0) {
      throw new TextBridgeParseError(textPath, i + 1);
    }
    const code = line.slice(0, tab).trim();
    const name = line.slice(tab + 1).trim();
    if (names.has(code)) {
      names.set(code, name);
      updated.push(code);
    } else {
      ignored.push(code);
    }
  });

  const entries: TraitEntry[] = [...names].map(([code, name]) => ({ code, name }));
  entries.sort(compareTraitEntries);
  await writeJsonFile(jsonPath, entries, indent);

  return { updated, ignored };
}
