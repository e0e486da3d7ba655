import type { Client, ClientOptions } from '@faultline/types';
import { logger } from '@faultline/utils';

import { getSdkCarrier } from './carrier';

/** A class object that can instantiate Client objects. */
export type ClientClass<F extends Client, O extends ClientOptions> = new (
  options: O,
) => F;

/**
 * 这个函数用于创建一个新的 SDK 客户端实例，并绑定为当前进程的客户端
 *
 * @param clientClass 用于创建客户端实例的类
 * @param options 用于初始化客户端的配置选项
 * @returns 返回一个新的客户端实例
 */
export function initAndBind<F extends Client, O extends ClientOptions>(
  clientClass: ClientClass<F, O>,
  options: O,
): F {
  if (options.debug === true) {
    logger.enable();
  }

  // 非法的配置会在构造函数中抛出，此时不会替换已经绑定的客户端
  const client = new clientClass(options);
  setCurrentClient(client);

  return client;
}

/**
 * 将给定的客户端实例设置为当前进程的客户端
 */
export function setCurrentClient(client: Client | undefined): void {
  getSdkCarrier().client = client;
}

/**
 * 获取当前绑定的客户端
 */
export function getClient(): Client | undefined {
  return getSdkCarrier().client;
}
