/**
 * 根据采样率决定事件是否保留
 *
 * 采样率为 1 时总是保留，为 0 时总是丢弃，两种情况都不会消耗随机数；
 * 其余情况抽取一个 [0, 1) 之间的随机数，小于采样率时保留
 *
 * 每次提交都会重新抽取，不会在进程级别缓存结果
 *
 * @param sampleRate 已经校验过的采样率
 * @param random 随机数来源，测试中可以替换为确定的实现
 */
export function sampleEvent(
  sampleRate: number,
  random: () => number = Math.random,
): boolean {
  if (sampleRate === 1) {
    return true;
  }

  if (sampleRate === 0) {
    return false;
  }

  return random() < sampleRate;
}
