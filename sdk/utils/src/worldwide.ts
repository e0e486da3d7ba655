/** Internal global with common properties and SDK extensions  */
export type InternalGlobal = {
  console?: Console;
};

/** 获取当前JavaScript运行时的全局对象 */
export const GLOBAL_OBJ: InternalGlobal = globalThis;
