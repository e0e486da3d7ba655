import { logger } from '@faultline/utils';
import { DEBUG_BUILD } from '../debug-build';

/**
 * 校验采样率：只接受 [0, 1] 之间的有限数字
 *
 * 布尔值和数字字符串不做转换，和 `sampleRate: number` 的声明保持一致；
 * 其他值一律返回 `undefined`，由调用方决定如何报错
 */
export function parseSampleRate(sampleRate: unknown): number | undefined {
  if (
    typeof sampleRate === 'number' &&
    Number.isFinite(sampleRate) &&
    sampleRate >= 0 &&
    sampleRate <= 1
  ) {
    return sampleRate;
  }

  DEBUG_BUILD &&
    logger.warn(
      `Given sample rate is invalid. Sample rate must be a number between 0 and 1. Got ${String(
        sampleRate,
      )} of type ${typeof sampleRate}.`,
    );
  return undefined;
}
