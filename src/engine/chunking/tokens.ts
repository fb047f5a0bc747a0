/**
 * Token estimation used for chunk budgets
 */

const CJK_PATTERN = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uff00-\uffef]/g;

export type TokenEstimator = (text: string) => number;

/**
 * Rough estimation: ~4 characters per token for Latin text,
 * roughly one token per CJK character.
 */
export function estimateTokens(text: string): number {
  const cjkCount = text.match(CJK_PATTERN)?.length ?? 0;
  const otherLength = text.length - cjkCount;
  return Math.ceil(otherLength / 4) + cjkCount;
}
