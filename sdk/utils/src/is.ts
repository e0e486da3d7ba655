const objectToString = Object.prototype.toString;

/**
 * 用于检查一个给定的值是否是特定内置类（如 Array、Date、RegExp 等）
 *
 * @param wat The value to be checked
 * @param className
 * @returns A boolean representing the result.
 */
function isBuiltin(wat: unknown, className: string): boolean {
  return objectToString.call(wat) === `[object ${className}]`;
}

/**
 * 用于检查一个给定的值是否是一个普通对象字面量或类实例。
 *
 * 注意类实例同样会返回 true，需要区分时使用 {@link isPojo}
 */
export function isPlainObject(wat: unknown): wat is Record<string, unknown> {
  return isBuiltin(wat, 'Object');
}

/**
 * 判断一个值是否为普通对象：原型是 Object.prototype 或者没有原型
 *
 * 类实例、Date、Map 等有固定结构的对象都会返回 false
 */
export function isPojo(wat: unknown): wat is Record<string, unknown> {
  if (!isPlainObject(wat)) {
    return false;
  }

  try {
    const prototype: unknown = Object.getPrototypeOf(wat);
    return prototype === null || prototype === Object.prototype;
  } catch {
    return false;
  }
}

/**
 * 检查给定的值是否为 Error 实例
 */
export function isError(wat: unknown): wat is Error {
  switch (objectToString.call(wat)) {
    case '[object Error]':
    case '[object Exception]':
    case '[object DOMException]':
      return true;
    default:
      return wat instanceof Error;
  }
}

/**
 * 目标格式可以原样表示的标量：字符串、有限数字、布尔值、null 和 undefined
 *
 * 这些值在清洗时可以直接跳过，不需要尝试编码；NaN 和 ±Infinity 会被 JSON 写成 null，不算在内
 */
export function isSafeScalar(
  wat: unknown,
): wat is string | number | boolean | null | undefined {
  return (
    wat === null ||
    wat === undefined ||
    typeof wat === 'string' ||
    (typeof wat === 'number' && Number.isFinite(wat)) ||
    typeof wat === 'boolean'
  );
}
