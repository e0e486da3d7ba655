import { isError, isPojo } from './is';
import { jsonCodec } from './json';
import { getFunctionName } from './stacktrace';

/** 连生成文本都失败时使用的占位文本 */
const NON_SERIALIZABLE = '**non-serializable**';

const CIRCULAR = '[Circular ~]';

/** 嵌套对象最多展开的层数，更深的对象只输出类型名 */
const MAX_DEPTH = 3;

/**
 * 把任意值渲染成便于阅读的文本，用于无法序列化的值的兜底
 *
 * 输出格式只保证可读，不保证稳定；这个函数永远不会抛出异常
 *
 * @example
 * inspect(() => {})          // '[Function: <anonymous>]'
 * inspect(10n)               // '[BigInt: 10]'
 * inspect(new Socket())      // 'Socket { handle: [BigInt: 10], peer: "db.internal:5432" }'
 * inspect(new Set([1, 2]))   // 'Set(2) { 1, 2 }'
 */
export function inspect(value: unknown): string {
  try {
    if (typeof value === 'string') {
      return value;
    }

    // 普通对象和数组优先输出 JSON，里面有无法编码的值时再逐个字段展开
    if (isPojo(value) || Array.isArray(value)) {
      const encoded = jsonCodec.encode(value);
      if (encoded.ok) {
        return encoded.value;
      }
    }

    return formatValue(value, 0, new Set());
  } catch {
    // 读取字段时抛出异常（例如 getter 或 Proxy），只输出类型名
    return describeOpaque(value);
  }
}

function formatValue(value: unknown, depth: number, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : `[${String(value)}]`;
    case 'bigint':
      return `[BigInt: ${String(value)}]`;
    case 'symbol':
      return `[${String(value)}]`;
    case 'function':
      return `[Function: ${getFunctionName(value)}]`;
    case 'object':
      return value === null ? 'null' : formatObject(value, depth, seen);
    default:
      return String(value);
  }
}

function formatObject(value: object, depth: number, seen: Set<object>): string {
  if (isError(value)) {
    return `${value.name}: ${value.message}`;
  }

  if (value instanceof Date) {
    return isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  if (seen.has(value)) {
    return CIRCULAR;
  }

  const name = getConstructorName(value);

  if (depth >= MAX_DEPTH) {
    return `[${name}]`;
  }

  if (value instanceof WeakMap || value instanceof WeakSet) {
    return `${name} { <items unknown> }`;
  }

  seen.add(value);
  try {
    const next = depth + 1;

    if (value instanceof Map) {
      const entries = Array.from(
        value,
        ([key, item]) => `${formatValue(key, next, seen)} => ${formatValue(item, next, seen)}`,
      );
      return `${name}(${value.size}) ${wrap(entries, '{', '}')}`;
    }

    if (value instanceof Set) {
      const items = Array.from(value, (item) => formatValue(item, next, seen));
      return `${name}(${value.size}) ${wrap(items, '{', '}')}`;
    }

    if (Array.isArray(value)) {
      return wrap(
        value.map((item) => formatValue(item, next, seen)),
        '[',
        ']',
      );
    }

    const fields = Object.entries(value).map(
      ([key, item]) => `${formatKey(key)}: ${formatValue(item, next, seen)}`,
    );

    if (name === 'Object') {
      return wrap(fields, '{', '}');
    }
    if (name === 'null prototype') {
      return `[Object: null prototype] ${wrap(fields, '{', '}')}`;
    }
    return `${name} ${wrap(fields, '{', '}')}`;
  } finally {
    seen.delete(value);
  }
}

function wrap(parts: string[], open: string, close: string): string {
  return parts.length ? `${open} ${parts.join(', ')} ${close}` : `${open}${close}`;
}

function formatKey(key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? key : JSON.stringify(key);
}

/** 最后的兜底：对象只输出 `[object 类型名]` */
function describeOpaque(value: unknown): string {
  try {
    return value !== null && typeof value === 'object'
      ? `[object ${getConstructorName(value)}]`
      : NON_SERIALIZABLE;
  } catch {
    return NON_SERIALIZABLE;
  }
}

/** 取对象构造函数的名称，没有原型的对象返回 `null prototype` */
function getConstructorName(value: object): string {
  const prototype: unknown = Object.getPrototypeOf(value);

  if (prototype === null) {
    return 'null prototype';
  }

  if (
    typeof prototype === 'object' &&
    'constructor' in prototype &&
    typeof prototype.constructor === 'function' &&
    prototype.constructor.name
  ) {
    return prototype.constructor.name;
  }

  return 'Object';
}
