/**
 * 디렉토리 경로가 존재하지 않거나 디렉토리가 아닐 때 throw된다.
 * `getJsonFiles`에서 루트 또는 지정한 cycle 디렉토리를 찾지 못했을 때 발생한다.
 *
 * @example
 * await getJsonFiles('/no/such/dir'); // throws DirectoryNotFoundError
 */
export class DirectoryNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Not a directory: "${path}"`);
    this.name = 'DirectoryNotFoundError';
  }
}

/**
 * 마스터 traits 파일 또는 언어별 traits 사전이 없을 때 throw된다.
 * `updatePlaceholder`는 `makePlaceholder`가, `updateTraits`는 `updatePlaceholder`가 먼저 실행되어야 한다.
 */
export class TraitsFileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Traits file not found: "${path}"`);
    this.name = 'TraitsFileNotFoundError';
  }
}

/**
 * `translations/<lang>` 디렉토리가 존재하지 않을 때 throw된다.
 */
export class LanguageNotFoundError extends Error {
  constructor(public readonly language: string) {
    super(`Language directory not found: "${language}"`);
    this.name = 'LanguageNotFoundError';
  }
}

/**
 * 영문 카드의 trait 코드가 언어별 traits 사전에 없을 때 throw된다.
 * 전파 전체가 중단되며 어떤 파일도 기록되지 않는다.
 * `updatePlaceholder`를 다시 실행하면 해결된다.
 */
export class MissingTraitTranslationError extends Error {
  constructor(
    public readonly language: string,
    public readonly traitCode: string,
    public readonly file: string,
  ) {
    super(`Trait "${traitCode}" has no "${language}" entry (in ${file})`);
    this.name = 'MissingTraitTranslationError';
  }
}

/**
 * 텍스트 브리지 파일의 줄에 탭 구분자가 없을 때 throw된다.
 */
export class TextBridgeParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly line: number,
  ) {
    super(`Missing tab separator at ${filePath}:${line}`);
    this.name = 'TextBridgeParseError';
  }
}

/**
 * JSON 파싱 실패, 또는 최상위 구조가 기대한 배열 형태가 아닐 때 throw된다.
 */
export class JsonFileError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(`${reason}: ${filePath}`);
    this.name = 'JsonFileError';
  }
}
