/**
 * cardtrait 설정 파일 로더.
 *
 * `.cardtrait.jsonc` 또는 `.cardtrait.json`을 탐색하여 로드한다.
 * `jsonc-parser`로 주석 포함 JSONC를 파싱하고,
 * 모든 필드를 엄격하게 검증한 뒤 `Result` 패턴으로 반환한다.
 *
 * @example
 * ```ts
 * const result = await loadConfig();
 * if (isErr(result)) {
 *   console.error(result.data);
 *   process.exit(1);
 * }
 * const options = result; // CardtraitFileConfig
 * ```
 */

import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { err, isErr } from '@zipbul/result';
import type { Result } from '@zipbul/result';

import {
  DEFAULT_INDENT,
  DEFAULT_LANGUAGE,
  DEFAULT_PACK_DIR,
  DEFAULT_TRAITS_FILE,
  DEFAULT_TRANSLATIONS_DIR,
  type CardtraitOptions,
} from './config';
import { isFile } from './fs/json-files';

// ── Types ──

/** 설정 파일에서 읽은 전체 구성. */
export interface CardtraitFileConfig {
  /** 절대 경로 */
  rootDir: string;
  /** 설정된 값 그대로. 상대 경로면 `setupCardtrait`가 `rootDir` 기준으로 확정한다 */
  packDir: string;
  /** `packDir`와 같은 규칙 */
  translationsDir: string;
  traitsFile: string;
  language: string;
  indent: number;
}

/** config 에러 데이터 */
export interface ConfigError {
  code: 'FILE_NOT_FOUND' | 'PARSE_ERROR' | 'VALIDATION_ERROR';
  message: string;
  filePath?: string;
}

const CONFIG_FILE_NAMES = ['.cardtrait.jsonc', '.cardtrait.json'] as const;

// ── Validation helpers ──

type ValidationErrors = string[];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string, errors: ValidationErrors): void {
  if (key in obj && typeof obj[key] !== 'string') {
    errors.push(`"${key}": string이어야 합니다 (received ${typeof obj[key]})`);
  }
}

function assertNonEmptyString(
  obj: Record<string, unknown>,
  key: string,
  errors: ValidationErrors,
): void {
  if (!(key in obj)) return;
  const val = obj[key];
  if (typeof val !== 'string') {
    errors.push(`"${key}": string이어야 합니다 (received ${typeof val})`);
  } else if (val.trim() === '') {
    errors.push(`"${key}": 비어있을 수 없습니다`);
  }
}

function assertPositiveInt(
  obj: Record<string, unknown>,
  key: string,
  errors: ValidationErrors,
): void {
  if (!(key in obj)) return;
  const val = obj[key];
  if (typeof val !== 'number' || !Number.isInteger(val) || val <= 0) {
    errors.push(`"${key}": 양의 정수여야 합니다 (received ${String(val)})`);
  }
}

const KNOWN_TOP_KEYS = new Set([
  'rootDir',
  'packDir',
  'translationsDir',
  'traitsFile',
  'language',
  'indent',
]);

function stringOr(obj: Record<string, unknown>, key: string, fallback: string): string {
  const val = obj[key];
  return typeof val === 'string' ? val : fallback;
}

// ── Core ──

/**
 * 원시 파싱 결과를 검증하고 `CardtraitFileConfig`로 변환한다.
 * 알 수 없는 키, 타입 오류, 범위 오류를 모두 수집한 뒤 한번에 보고한다.
 */
export function validateRawConfig(
  raw: unknown,
  filePath: string,
): Result<CardtraitFileConfig, ConfigError> {
  if (!isPlainObject(raw)) {
    return err({
      code: 'VALIDATION_ERROR',
      message: '설정 파일의 최상위는 객체여야 합니다',
      filePath,
    });
  }

  const errors: ValidationErrors = [];

  // ── 알 수 없는 키 감지 ──
  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_KEYS.has(key)) {
      errors.push(`알 수 없는 키: "${key}"`);
    }
  }

  assertString(raw, 'rootDir', errors);
  assertNonEmptyString(raw, 'packDir', errors);
  assertNonEmptyString(raw, 'translationsDir', errors);
  assertNonEmptyString(raw, 'traitsFile', errors);
  assertNonEmptyString(raw, 'language', errors);
  assertPositiveInt(raw, 'indent', errors);

  if (typeof raw['traitsFile'] === 'string' && !raw['traitsFile'].toLowerCase().endsWith('.json')) {
    errors.push(`"traitsFile": .json 파일이어야 합니다 (received "${raw['traitsFile']}")`);
  }

  if (errors.length > 0) {
    return err({
      code: 'VALIDATION_ERROR',
      message: errors.join('\n'),
      filePath,
    });
  }

  // ── 기본값 병합 ──
  const rootDir = resolve(dirname(filePath), stringOr(raw, 'rootDir', '.'));
  const indent = raw['indent'];

  return {
    rootDir,
    packDir: stringOr(raw, 'packDir', DEFAULT_PACK_DIR),
    translationsDir: stringOr(raw, 'translationsDir', DEFAULT_TRANSLATIONS_DIR),
    traitsFile: stringOr(raw, 'traitsFile', DEFAULT_TRAITS_FILE),
    language: stringOr(raw, 'language', DEFAULT_LANGUAGE),
    indent: typeof indent === 'number' ? indent : DEFAULT_INDENT,
  };
}

/**
 * 지정된 경로에서 설정 파일을 읽고 파싱+검증한다.
 */
export async function loadConfigFromPath(
  filePath: string,
): Promise<Result<CardtraitFileConfig, ConfigError>> {
  const absPath = resolve(filePath);
  if (!(await isFile(absPath))) {
    return err({
      code: 'FILE_NOT_FOUND',
      message: `설정 파일을 찾을 수 없습니다: ${absPath}`,
      filePath: absPath,
    });
  }

  let text: string;
  try {
    text = await readFile(absPath, 'utf-8');
  } catch (e) {
    return err({
      code: 'PARSE_ERROR',
      message: `설정 파일 읽기 실패: ${e instanceof Error ? e.message : String(e)}`,
      filePath: absPath,
    });
  }

  const parseErrors: ParseError[] = [];
  const parsed: unknown = parse(text, parseErrors, { allowTrailingComma: true });
  const first = parseErrors[0];
  if (first) {
    return err({
      code: 'PARSE_ERROR',
      message: `JSONC 파싱 실패: ${printParseErrorCode(first.error)} (offset ${first.offset})`,
      filePath: absPath,
    });
  }

  return validateRawConfig(parsed, absPath);
}

/**
 * CWD에서 `.cardtrait.jsonc` 또는 `.cardtrait.json`을 자동 탐색한다.
 * 찾으면 로드+검증, 없으면 기본값으로 config를 생성한다.
 *
 * @param cwd - 탐색 시작 디렉토리. 기본값: `process.cwd()`
 */
export async function loadConfig(
  cwd?: string,
): Promise<Result<CardtraitFileConfig, ConfigError>> {
  const baseDir = cwd ?? process.cwd();

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = resolve(baseDir, name);
    if (await isFile(candidate)) {
      return loadConfigFromPath(candidate);
    }
  }

  // 설정 파일 없음 → 기본값으로 생성
  return buildDefaultConfig(baseDir);
}

/**
 * CLI arg로 config를 override한다.
 * undefined인 arg는 무시한다. `root`를 바꾸면 상대 경로로 설정된 디렉토리는 새 루트 기준이 된다.
 */
export function mergeCliArgs(
  config: CardtraitFileConfig,
  args: {
    root?: string;
    language?: string;
  },
): CardtraitFileConfig {
  return {
    ...config,
    ...(args.root !== undefined ? { rootDir: resolve(args.root) } : {}),
    ...(args.language !== undefined ? { language: args.language } : {}),
  };
}

/**
 * 기본값만으로 config 생성. 설정 파일이 없을 때 사용.
 */
export function buildDefaultConfig(baseDir: string): CardtraitFileConfig {
  const rootDir = resolve(baseDir);
  return {
    rootDir,
    packDir: DEFAULT_PACK_DIR,
    translationsDir: DEFAULT_TRANSLATIONS_DIR,
    traitsFile: DEFAULT_TRAITS_FILE,
    language: DEFAULT_LANGUAGE,
    indent: DEFAULT_INDENT,
  };
}

/**
 * 설정 로드 결과의 들여쓰기. 로드에 실패했으면 기본값.
 * 경로를 직접 받는 텍스트 브리지 커맨드가 설정 파일 오류로 막히지 않도록 쓴다.
 */
export function indentOrDefault(result: Result<CardtraitFileConfig, ConfigError>): number {
  return isErr(result) ? DEFAULT_INDENT : result.indent;
}

/**
 * 확정된 파일 설정을 `setupCardtrait` 옵션으로 변환한다.
 */
export function toOptions(config: CardtraitFileConfig): CardtraitOptions {
  return {
    rootDir: config.rootDir,
    packDir: config.packDir,
    translationsDir: config.translationsDir,
    traitsFile: config.traitsFile,
    language: config.language,
    indent: config.indent,
  };
}
