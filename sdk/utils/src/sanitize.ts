import type { JsonCodec } from '@faultline/types';

import { inspect } from './inspect';
import { isPojo, isSafeScalar } from './is';

/** 循环引用的占位文本 */
const CIRCULAR = '[Circular ~]';

/**
 * 清洗单个值的结果
 *
 * changed 为 false 时 value 就是传入的值本身
 */
export type Sanitized =
  | { changed: false; value: unknown }
  | { changed: true; value: unknown };

/**
 * 清洗一个键值对象中的每个值，保证结果可以被 codec 编码
 *
 * 没有任何值发生变化时返回原对象本身；否则返回浅拷贝，只替换变化了的键，
 * 不会增加或删除键
 *
 * @param record 要清洗的对象，例如事件的 extra、user、tags
 * @param codec 目标格式的序列化工具
 */
export function sanitizeValues<T extends object>(record: T, codec: JsonCodec): T {
  const ancestors = new Set<unknown>([record]);
  let result: T | undefined;

  for (const [key, value] of Object.entries(record)) {
    const sanitized = sanitizeValue(value, codec, ancestors);
    if (sanitized.changed) {
      result = result || { ...record };
      Reflect.set(result, key, sanitized.value);
    }
  }

  return result || record;
}

/**
 * 递归清洗一个任意嵌套的值
 *
 * - 字符串、有限数字、布尔值、null、undefined 原样返回，不做递归
 * - 数组逐个清洗元素，没有元素变化时返回原数组，否则返回只替换了变化位置的新数组
 * - 普通对象逐个清洗值，规则同数组；类实例等有固定结构的对象不展开
 * - 其他值尝试编码，成功则原样返回，失败则替换成可读的文本（NaN、Error、Map 等也走这里）
 *
 * @param value 要清洗的值
 * @param codec 目标格式的序列化工具
 * @param ancestors 当前递归路径上的容器，用来识别循环引用
 */
export function sanitizeValue(
  value: unknown,
  codec: JsonCodec,
  ancestors: Set<unknown> = new Set(),
): Sanitized {
  if (isSafeScalar(value)) {
    return { changed: false, value };
  }

  if (Array.isArray(value) || isPojo(value)) {
    if (ancestors.has(value)) {
      return { changed: true, value: CIRCULAR };
    }

    ancestors.add(value);
    try {
      return Array.isArray(value)
        ? sanitizeArray(value, codec, ancestors)
        : sanitizeObject(value, codec, ancestors);
    } finally {
      ancestors.delete(value);
    }
  }

  return codec.encode(value).ok
    ? { changed: false, value }
    : { changed: true, value: inspect(value) };
}

function sanitizeArray(
  array: unknown[],
  codec: JsonCodec,
  ancestors: Set<unknown>,
): Sanitized {
  let copy: unknown[] | undefined;

  for (let index = 0; index < array.length; index++) {
    const sanitized = sanitizeValue(array[index], codec, ancestors);
    if (sanitized.changed) {
      copy = copy || array.slice();
      copy[index] = sanitized.value;
    }
  }

  return copy ? { changed: true, value: copy } : { changed: false, value: array };
}

function sanitizeObject(
  object: Record<string, unknown>,
  codec: JsonCodec,
  ancestors: Set<unknown>,
): Sanitized {
  let copy: Record<string, unknown> | undefined;

  for (const [key, item] of Object.entries(object)) {
    const sanitized = sanitizeValue(item, codec, ancestors);
    if (sanitized.changed) {
      copy = copy || { ...object };
      copy[key] = sanitized.value;
    }
  }

  return copy ? { changed: true, value: copy } : { changed: false, value: object };
}
