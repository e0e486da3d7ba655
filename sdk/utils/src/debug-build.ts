// 这个常量通常在构建时由构建工具注入，表示当前构建是否为调试版本
declare const __DEBUG_BUILD__: boolean | undefined;

/**
 * 在开发和调试构建中为 true，生产构建中由构建工具替换为 false
 *
 * 没有经过构建工具处理（例如直接运行源码或测试）时视为调试构建
 *
 * 这个常量只在 utils 包内部使用，不应跨越包边界导出
 */
export const DEBUG_BUILD =
  typeof __DEBUG_BUILD__ === 'undefined' || __DEBUG_BUILD__;
