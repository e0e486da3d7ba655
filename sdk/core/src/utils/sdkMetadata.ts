import type { ClientOptions } from '@faultline/types';
import { SDK_VERSION } from '@faultline/utils';

/**
 * 用于构建 SDK 初始化选项中的元数据 (metadata)
 *
 * 已经存在 sdk 信息时保持不变，平台包可以借此声明自己的名称和依赖的包
 *
 * @param options 会被修改的 SDK 选项对象
 * @param name SDK 的名称，如 node
 * @param names 写入元数据的包名
 * @param source 包的来源
 */
export function applySdkMetadata(
  options: ClientOptions,
  name: string,
  names = [name],
  source = 'npm',
): void {
  // 获取元数据
  const metadata = options._metadata || {};

  // 不存在sdk 信息,则构建sdk 元数据
  if (!metadata.sdk) {
    metadata.sdk = {
      name: `faultline.javascript.${name}`,
      packages: names.map((packageName) => ({
        name: `${source}:@faultline/${packageName}`,
        version: SDK_VERSION,
      })),
      version: SDK_VERSION,
    };
  }

  // 更新配置的元数据,使得这些元数据在 SDK 初始化时可用
  options._metadata = metadata;
}
