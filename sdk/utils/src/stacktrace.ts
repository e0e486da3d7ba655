const defaultFunctionName = '<anonymous>';

/**
 * 安全地从自身提取函数名
 */
export function getFunctionName(fn: unknown): string {
  try {
    if (!fn || typeof fn !== 'function') {
      return defaultFunctionName;
    }
    return fn.name || defaultFunctionName;
  } catch (e) {
    // 某些环境中访问函数的自定义属性会抛出 "Permission denied"
    return defaultFunctionName;
  }
}
