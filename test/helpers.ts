import { mkdtemp, mkdir, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { setupCardtrait, type CardtraitContext, type CardtraitOptions } from '../index';

export interface TestContext {
  ctx: CardtraitContext;
  rootDir: string;
  /** rootDir 기준 상대 경로에 JSON을 4칸 들여쓰기로 기록 (상위 디렉토리 자동 생성) */
  writeJson: (relPath: string, data: unknown) => Promise<string>;
  /** rootDir 기준 상대 경로의 JSON을 읽는다 */
  readJson: (relPath: string) => Promise<unknown>;
  readText: (relPath: string) => Promise<string>;
  cleanup: () => Promise<void>;
}

export async function createTestContext(
  options: Omit<CardtraitOptions, 'rootDir'> = {},
): Promise<TestContext> {
  const rootDir = await mkdtemp(join(tmpdir(), 'cardtrait_test_'));
  const ctx = setupCardtrait({ ...options, rootDir });

  return {
    ctx,
    rootDir,
    writeJson: async (relPath, data) => {
      const p = join(rootDir, relPath);
      await mkdir(dirname(p), { recursive: true });
      await writeFile(p, JSON.stringify(data, null, 4), 'utf-8');
      return p;
    },
    readJson: async (relPath) => JSON.parse(await readFile(join(rootDir, relPath), 'utf-8')),
    readText: (relPath) => readFile(join(rootDir, relPath), 'utf-8'),
    cleanup: () => rm(rootDir, { recursive: true, force: true }),
  };
}
