import type { Package } from './package';

export interface SdkInfo {
  // SDK 的名称（例如 faultline.javascript.node）
  name: string;
  // SDK 的版本号
  version: string;
  // 该 SDK 启用的集成
  integrations?: string[];
  // SDK 使用的依赖包
  packages?: Package[];
}
