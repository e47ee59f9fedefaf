import { basename, resolve } from 'node:path';

import {
  DEFAULT_INDENT,
  DEFAULT_LANGUAGE,
  DEFAULT_PACK_DIR,
  DEFAULT_TRAITS_FILE,
  DEFAULT_TRANSLATIONS_DIR,
  type CardtraitContext,
  type CardtraitOptions,
} from './config';

/**
 * cardtrait 컨텍스트를 초기화한다.
 *
 * 모든 디렉토리와 마스터 traits 파일 경로를 `rootDir` 기준 절대 경로로 확정한다.
 * 파일시스템은 건드리지 않으며, 경로 존재 여부는 각 연산이 검사한다.
 *
 * @param options - 초기화 옵션.
 * @returns 초기화된 `CardtraitContext`.
 */
export function setupCardtrait(options: CardtraitOptions): CardtraitContext {
  const rootDir = resolve(options.rootDir);
  const packDir = resolve(rootDir, options.packDir ?? DEFAULT_PACK_DIR);
  const traitsFile = options.traitsFile ?? DEFAULT_TRAITS_FILE;

  return {
    rootDir,
    packDir,
    packDirName: basename(packDir),
    translationsDir: resolve(rootDir, options.translationsDir ?? DEFAULT_TRANSLATIONS_DIR),
    traitsFile,
    masterTraitsPath: resolve(rootDir, traitsFile),
    language: options.language ?? DEFAULT_LANGUAGE,
    indent: options.indent ?? DEFAULT_INDENT,
  };
}
