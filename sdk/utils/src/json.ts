import type { EncodeResult, JsonCodec } from '@faultline/types';

import { isError } from './is';

/**
 * 用 JSON.stringify 实现的序列化工具
 *
 * JSON.stringify 对函数、symbol 和 undefined 会返回 undefined，这里把它们视为编码失败；
 * BigInt 和循环引用会让 JSON.stringify 抛出异常，同样转换为编码失败
 *
 * 另外有些值 JSON.stringify 不会报错，但写出来的内容已经丢失：
 * Error、Map、Set 这类对象会变成 `{}`，NaN 和 ±Infinity 会变成 `null`，这些也按编码失败处理。
 * 带 toJSON 的对象（例如 Date）在检查之前已经被转换，不受影响
 */
export const jsonCodec: JsonCodec = {
  encode(value: unknown): EncodeResult {
    try {
      const encoded: string | undefined = JSON.stringify(value, rejectLossyValue);
      if (encoded === undefined) {
        return {
          ok: false,
          error: new TypeError(`Value of type ${typeof value} is not JSON-serializable`),
        };
      }
      return { ok: true, value: encoded };
    } catch (error) {
      return { ok: false, error };
    }
  },
};

function rejectLossyValue(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TypeError(`Value ${String(value)} is not JSON-serializable`);
  }

  if (isLossyObject(value)) {
    const tag = Object.prototype.toString.call(value).slice(8, -1);
    throw new TypeError(`Value of type ${tag} is not JSON-serializable`);
  }

  return value;
}

/** 序列化后只剩 `{}` 的内置对象 */
function isLossyObject(value: unknown): boolean {
  return (
    isError(value) ||
    value instanceof Map ||
    value instanceof Set ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof RegExp ||
    value instanceof Promise
  );
}
