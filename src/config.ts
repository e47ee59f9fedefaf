import { join } from 'node:path';

export const DEFAULT_PACK_DIR = 'pack';
export const DEFAULT_TRANSLATIONS_DIR = 'translations';
export const DEFAULT_TRAITS_FILE = 'traits.json';
export const DEFAULT_LANGUAGE = 'ko';
export const DEFAULT_INDENT = 4;

export interface CardtraitOptions {
  /** 콘텐츠 루트 절대 경로. 나머지 상대 경로의 기준 */
  rootDir: string;
  /** 영문 팩 디렉토리. 미지정 시 `pack` */
  packDir?: string;
  /** 번역 루트 디렉토리. 미지정 시 `translations` */
  translationsDir?: string;
  /** traits 파일 이름. 마스터 파일과 언어별 사전 모두 이 이름을 쓴다. 미지정 시 `traits.json` */
  traitsFile?: string;
  /** 기본 언어 코드. 미지정 시 `ko` */
  language?: string;
  /** JSON 출력 들여쓰기 칸 수. 미지정 시 4 */
  indent?: number;
}

export interface CardtraitContext {
  rootDir: string;
  /** 영문 팩 디렉토리 절대 경로 */
  packDir: string;
  /** 영문 팩 디렉토리 이름. 번역 트리 아래에서도 같은 이름을 쓴다 */
  packDirName: string;
  /** 번역 루트 절대 경로 */
  translationsDir: string;
  traitsFile: string;
  /** 마스터 traits 파일 절대 경로 */
  masterTraitsPath: string;
  language: string;
  indent: number;
}

/** `translations/<lang>` */
export function languageDir(ctx: CardtraitContext, language: string): string {
  return join(ctx.translationsDir, language);
}

/** `translations/<lang>/traits.json` */
export function languageTraitsPath(ctx: CardtraitContext, language: string): string {
  return join(ctx.translationsDir, language, ctx.traitsFile);
}

/**
 * `translations/<lang>/pack`.
 * 영문 팩 디렉토리와 같은 이름을 사용해 동일한 트리를 미러링한다.
 */
export function languagePackDir(ctx: CardtraitContext, language: string): string {
  return join(ctx.translationsDir, language, ctx.packDirName);
}
