import type { Event, HookMethodRef } from '@faultline/types';
import { ConfigurationError, SdkError, isPlainObject } from '@faultline/utils';

/**
 * 解析后的钩子，两种配置形式统一成同一种调用方式
 */
export type HookInvoker = (...args: unknown[]) => unknown;

/** 发送前钩子的参数个数 */
export const BEFORE_SEND_EVENT_ARITY = 1;
/** 发送后钩子的参数个数 */
export const AFTER_SEND_EVENT_ARITY = 2;

/**
 * 判断一个值是否是 `[对象, 方法名]` 形式的钩子
 */
export function isHookMethodRef(value: unknown): value is HookMethodRef {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    ((typeof value[0] === 'object' && value[0] !== null) ||
      typeof value[0] === 'function') &&
    typeof value[1] === 'string'
  );
}

/**
 * 校验并解析一个钩子配置
 *
 * - undefined / null: 没有配置钩子，返回 undefined
 * - 函数: 声明的参数个数必须等于 arity
 * - `[对象, 方法名]`: 对象上必须存在该方法，调用时 this 指向该对象
 *
 * 其他任何值都属于配置错误，会直接抛出 ConfigurationError
 *
 * @param name 选项名，用于错误信息
 * @param hook 用户传入的配置
 * @param arity 钩子被调用时的参数个数
 */
export function resolveHook(
  name: string,
  hook: unknown,
  arity: number,
): HookInvoker | undefined {
  if (hook === undefined || hook === null) {
    return undefined;
  }

  if (typeof hook === 'function' && hook.length === arity) {
    const fn = hook;
    return (...args) => Reflect.apply(fn, undefined, args);
  }

  if (isHookMethodRef(hook)) {
    const [target, method] = hook;
    if (typeof Reflect.get(target, method) !== 'function') {
      throw new ConfigurationError(
        `\`${name}\` refers to \`${method}\`, which is not a function on the given target`,
      );
    }
    // 每次调用时重新读取方法，保证对象上的方法被替换后依然生效
    return (...args) => Reflect.apply(Reflect.get(target, method), target, args);
  }

  throw new ConfigurationError(
    `\`${name}\` must be a function that takes ${arity} argument${
      arity === 1 ? '' : 's'
    } or a [target, methodName] tuple`,
  );
}

/**
 * 调用发送前钩子
 *
 * 没有钩子时原样返回事件；钩子返回假值时返回 null 表示事件被丢弃；
 * 返回的不是事件时抛出 SdkError
 */
export function callBeforeSendEvent(
  hook: HookInvoker | undefined,
  event: Event,
): Event | null {
  if (!hook) {
    return event;
  }

  const result = hook(event);
  if (!result) {
    return null;
  }

  if (!isEvent(result)) {
    throw new SdkError(
      '`beforeSendEvent` must return a falsy value to drop the event or an event to send',
      'error',
    );
  }

  return result;
}

/** 判断钩子的返回值是否是一个事件 */
function isEvent(value: unknown): value is Event {
  return isPlainObject(value) && typeof value.event_id === 'string';
}
