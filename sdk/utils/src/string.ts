/**
 * 将字符串截断为最多 max 个字符
 *
 * 按 Unicode 码点计数而不是 UTF-16 码元，代理对不会被从中间截断；
 * 超出部分直接丢弃，不追加省略号
 *
 * @param str 要截断的字符串
 * @param max 最大字符数
 */
export function truncate(str: string, max: number): string {
  // 码元数量不超过 max 时码点数量一定也不超过
  if (str.length <= max) {
    return str;
  }

  const characters = Array.from(str);
  return characters.length <= max ? str : characters.slice(0, max).join('');
}
