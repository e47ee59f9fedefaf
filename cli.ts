#!/usr/bin/env tsx
/**
 * cardtrait CLI 엔트리포인트.
 *
 * 하위 커맨드:
 *   run                    마스터 목록 재생성 → 언어별 사전 보충 → traits 전파
 *   make-placeholder       영문 팩에서 마스터 traits 파일 생성
 *   update-placeholder     언어별 traits 사전에 새 항목 추가
 *   update-traits          번역 카드 파일에 traits 전파
 *   json2txt <json> <txt>  traits 사전 → 탭 구분 텍스트
 *   txt2json <json> <txt>  탭 구분 텍스트 → traits 사전
 *
 * 우선순위: CLI args > config file > defaults
 *
 * @example
 *   tsx cli.ts run --lang ko
 *   tsx cli.ts update-traits --lang de --cycle core --cycle dwl --overwrite
 *   tsx cli.ts json2txt translations/ko/traits.json ko-traits.txt
 */

import { parseArgs } from 'node:util';
import { isErr } from '@zipbul/result';
import {
  loadConfig,
  loadConfigFromPath,
  mergeCliArgs,
  toOptions,
  indentOrDefault,
} from './src/config-file';
import type { CardtraitFileConfig, ConfigError } from './src/config-file';
import type { Result } from '@zipbul/result';

// ── CLI arg 파싱 ──

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    root: { type: 'string' },
    lang: { type: 'string' },
    cycle: { type: 'string', multiple: true },
    overwrite: { type: 'boolean' },
    config: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
    version: { type: 'boolean', short: 'v' },
  },
  allowPositionals: true,
  strict: true,
});

// ── Help / Version ──

function printHelp(): void {
  process.stderr.write(`cardtrait — 카드 trait 현지화 도구

Usage:
  cardtrait <command> [options]

Commands:
  run                    make-placeholder → update-placeholder → update-traits
  make-placeholder       영문 팩에서 마스터 traits 파일 생성
  update-placeholder     언어별 traits 사전에 새 항목 추가
  update-traits          번역 카드 파일에 traits 전파
  json2txt <json> <txt>  traits 사전 → 탭 구분 텍스트
  txt2json <json> <txt>  탭 구분 텍스트 → traits 사전

Options:
  --root <path>          콘텐츠 루트 디렉토리
  --lang <code>          언어 코드 (기본값: ko)
  --cycle <name>         update-traits 대상 cycle (반복 가능)
  --overwrite            이미 번역된 traits도 다시 계산
  --config <path>        설정 파일 경로
  -h, --help             도움말 출력
  -v, --version          버전 출력

Priority: CLI args > config file > defaults
Config auto-search: .cardtrait.jsonc → .cardtrait.json (CWD)
`);
}

if (values.help) {
  printHelp();
  process.exit(0);
}

if (values.version) {
  process.stderr.write('cardtrait 0.1.0\n');
  process.exit(0);
}

// ── Subcommand dispatch ──

const COMMANDS = [
  'run',
  'make-placeholder',
  'update-placeholder',
  'update-traits',
  'json2txt',
  'txt2json',
] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

const subcommand = positionals[0];

if (!subcommand) {
  printHelp();
  process.stderr.write('\nError: subcommand를 지정해야 합니다 (예: run)\n');
  process.exit(1);
}

if (!isCommand(subcommand)) {
  process.stderr.write(`Error: 알 수 없는 subcommand "${subcommand}"\n`);
  process.stderr.write(`사용 가능한 subcommand: ${COMMANDS.join(', ')}\n`);
  process.exit(1);
}

try {
  await dispatch(subcommand);
} catch (e) {
  const name = e instanceof Error ? e.name : 'Error';
  const message = e instanceof Error ? e.message : String(e);
  process.stderr.write(`[${name}] ${message}\n`);
  process.exit(1);
}

// ── Config ──

async function resolveConfig(): Promise<CardtraitFileConfig> {
  let result: Result<CardtraitFileConfig, ConfigError>;

  if (values.config) {
    result = await loadConfigFromPath(values.config);
  } else {
    result = await loadConfig();
  }

  if (isErr(result)) {
    const e = result.data;
    process.stderr.write(`[config error] ${e.code}: ${e.message}\n`);
    if (e.filePath) {
      process.stderr.write(`  file: ${e.filePath}\n`);
    }
    process.exit(1);
  }

  return mergeCliArgs(result, { root: values.root, language: values.lang });
}

function requirePaths(command: Command): [string, string] {
  const jsonPath = positionals[1];
  const textPath = positionals[2];
  if (!jsonPath || !textPath) {
    process.stderr.write(`Error: ${command} <json> <txt> 경로를 모두 지정해야 합니다\n`);
    process.exit(1);
  }
  return [jsonPath, textPath];
}

// ── Commands ──

async function dispatch(command: Command): Promise<void> {
  const {
    setupCardtrait,
    makePlaceholder,
    updatePlaceholder,
    updateTraits,
    jsonToText,
    textToJson,
    runPipeline,
  } = await import('./index');

  // 텍스트 브리지는 경로를 직접 받으므로 디렉토리 설정이 필요 없다
  if (command === 'json2txt') {
    const [jsonPath, textPath] = requirePaths(command);
    const count = await jsonToText(jsonPath, textPath);
    process.stderr.write(`${count} entries written to ${textPath}\n`);
    return;
  }

  if (command === 'txt2json') {
    const [jsonPath, textPath] = requirePaths(command);
    const loaded = values.config ? await loadConfigFromPath(values.config) : await loadConfig();
    if (isErr(loaded)) {
      process.stderr.write(`[config warning] ${loaded.data.code}: 기본 들여쓰기를 사용합니다\n`);
    }
    const { updated, ignored } = await textToJson(jsonPath, textPath, indentOrDefault(loaded));
    for (const code of ignored) {
      process.stderr.write(`  ? ${code} (unknown code, ignored)\n`);
    }
    process.stderr.write(`${updated.length} entries updated in ${jsonPath}\n`);
    return;
  }

  const config = await resolveConfig();
  const ctx = setupCardtrait(toOptions(config));
  const lang = ctx.language;

  switch (command) {
    case 'run': {
      const { master, placeholder, traits } = await runPipeline(ctx, lang);
      process.stderr.write(`master: ${master.entries.length} traits from ${master.scannedFiles} files\n`);
      process.stderr.write(`${lang}: +${placeholder.added.length} placeholder entries (${placeholder.total} total)\n`);
      process.stderr.write(`${lang}: ${traits.written.length} pack files updated\n`);
      return;
    }
    case 'make-placeholder': {
      const master = await makePlaceholder(ctx);
      process.stderr.write(`master: ${master.entries.length} traits from ${master.scannedFiles} files\n`);
      return;
    }
    case 'update-placeholder': {
      const placeholder = await updatePlaceholder(ctx, lang);
      for (const code of placeholder.added) {
        process.stderr.write(`  + ${code}\n`);
      }
      process.stderr.write(`${lang}: +${placeholder.added.length} placeholder entries (${placeholder.total} total)\n`);
      return;
    }
    case 'update-traits': {
      const traits = await updateTraits(ctx, lang, {
        cycles: values.cycle,
        overwrite: values.overwrite ?? false,
      });
      for (const file of traits.files) {
        process.stderr.write(
          `  ${file.file}: ${file.changed.length} changed, ${file.skipped.length} skipped\n`,
        );
      }
      process.stderr.write(`${lang}: ${traits.written.length} pack files updated\n`);
      return;
    }
  }
}
