declare const __DEBUG_BUILD__: boolean | undefined;

/**
 * 与 utils 包中的同名常量含义相同，只在 core 包内部使用
 */
export const DEBUG_BUILD =
  typeof __DEBUG_BUILD__ === 'undefined' || __DEBUG_BUILD__;
