/**
 * 把一个有固定结构的记录（可能是类实例）展开为普通对象
 *
 * 只保留自身的可枚举属性，原型上的方法和 getter 会被丢掉
 */
export function toPlainObject<T extends object>(record: T): T {
  return { ...record };
}

/**
 * 浅层移除值为 undefined 或 null 的键，返回新的对象
 */
export function dropNilKeys<T extends object>(record: T): T {
  const result = { ...record };

  for (const [key, value] of Object.entries(result)) {
    if (value === undefined || value === null) {
      Reflect.deleteProperty(result, key);
    }
  }

  return result;
}
