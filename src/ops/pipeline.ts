import type { CardtraitContext } from '../config';
import {
  makePlaceholder,
  updatePlaceholder,
  type MakePlaceholderResult,
  type UpdatePlaceholderResult,
} from './placeholder';
import { updateTraits, type UpdateTraitsResult } from './propagate';

export interface PipelineResult {
  master: MakePlaceholderResult;
  placeholder: UpdatePlaceholderResult;
  traits: UpdateTraitsResult;
}

/**
 * 전체 파이프라인: 마스터 목록 재생성 → 언어별 사전 보충 → traits 전파(덮어쓰기 없음).
 * 각 단계는 앞 단계의 결과 파일에 의존하므로 순서대로 실행한다.
 *
 * @param language - 대상 언어. 미지정 시 `ctx.language`.
 */
export async function runPipeline(ctx: CardtraitContext, language?: string): Promise<PipelineResult> {
  const lang = language ?? ctx.language;
  const master = await makePlaceholder(ctx);
  const placeholder = await updatePlaceholder(ctx, lang);
  const traits = await updateTraits(ctx, lang, { overwrite: false });
  return { master, placeholder, traits };
}
