import { readdir, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';

import { DirectoryNotFoundError } from '../trait/errors';

function isJsonName(name: string): boolean {
  return extname(name).toLowerCase() === '.json';
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * `root` 아래의 팩 JSON 파일 목록을 `root` 기준 상대 경로로 반환한다.
 *
 * 최상위 `.json` 파일은 그대로 포함하고, 최상위 디렉토리(cycle)는 그 바로 아래의
 * `.json` 파일만 모은다 (재귀하지 않음).
 *
 * @param root - 탐색 루트.
 * @param cycles - 탐색할 최상위 항목 이름. 미지정 또는 빈 배열이면 전체.
 * @throws {DirectoryNotFoundError} `root` 또는 지정한 cycle이 존재하지 않을 때.
 */
export async function getJsonFiles(root: string, cycles?: readonly string[]): Promise<string[]> {
  if (!(await isDirectory(root))) {
    throw new DirectoryNotFoundError(root);
  }

  const names = cycles && cycles.length > 0 ? [...new Set(cycles)] : await readdir(root);
  const files: string[] = [];

  for (const name of names) {
    const entryPath = join(root, name);
    if (await isFile(entryPath)) {
      if (isJsonName(name)) files.push(name);
      continue;
    }
    if (!(await isDirectory(entryPath))) {
      throw new DirectoryNotFoundError(entryPath);
    }
    const packs = await readdir(entryPath, { withFileTypes: true });
    for (const pack of packs) {
      if (pack.isFile() && isJsonName(pack.name)) {
        files.push(join(name, pack.name));
      }
    }
  }

  return files.sort();
}
