import type { Client, LastEventStore } from '@faultline/types';
import { SDK_VERSION } from '@faultline/utils';

/**
 * 挂在全局对象上、保存 SDK 状态的载体
 * @hidden
 */
export interface Carrier {
  __FAULTLINE__?: VersionedCarrier;
}

/**
 * 为每个 SDK 版本单独保存一份状态，同一进程中存在多个版本的 SDK 时互不影响
 */
interface VersionedCarrier {
  versions?: Record<string, SdkCarrier>;
}

/**
 * 实际保存 SDK 实例状态的对象
 */
export interface SdkCarrier {
  // 当前绑定的客户端
  client?: Client;
  // 进程内共享的最近一次事件
  lastEventStore?: LastEventStore;
}

declare global {
  // eslint-disable-next-line no-var
  var __FAULTLINE__: VersionedCarrier | undefined;
}

/** 全局对象本身就是载体 */
const MAIN_CARRIER: Carrier = globalThis;

/**
 * 获取当前 SDK 版本的状态对象，不存在时创建
 */
export function getSdkCarrier(carrier: Carrier = MAIN_CARRIER): SdkCarrier {
  const versioned = (carrier.__FAULTLINE__ = carrier.__FAULTLINE__ || {});

  const versions = (versioned.versions = versioned.versions || {});
  return (versions[SDK_VERSION] = versions[SDK_VERSION] || {});
}
