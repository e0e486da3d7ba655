import { SdkError } from './error';

export interface PromiseBuffer<T> {
  // 暴露内部数组，方便测试断言缓冲区的状态
  $: Array<PromiseLike<T>>;
  add(taskProducer: () => PromiseLike<T>): PromiseLike<T>;
  drain(timeout?: number): PromiseLike<boolean>;
}

/**
 * 用于创建一个 Promise 缓冲区对象，限制并控制并发的 Promise 数量，并提供添加任务和等待所有任务完成的方法
 *
 * @param limit 缓冲区中允许的最大 Promise 数量，如果超过限制，则新的 Promise 不会被添加到缓冲区
 */
export function makePromiseBuffer<T>(limit?: number): PromiseBuffer<T> {
  const buffer: Array<PromiseLike<T>> = [];

  /** 判断缓冲区是否可以接受新的promise */
  function isReady(): boolean {
    return limit === undefined || buffer.length < limit;
  }

  /**
   * 从队列中移除指定 promise
   */
  function remove(task: PromiseLike<T>): void {
    const index = buffer.indexOf(task);
    if (index !== -1) {
      buffer.splice(index, 1);
    }
  }

  /**
   * 将 Promise 添加到队列，并在任务完成时自动移除自己
   *
   * @param taskProducer 传入生产 Promise 的函数而不是 Promise 本身，
   *        这样缓冲区已满时任务根本不会开始执行
   *
   * @returns The original promise.
   */
  function add(taskProducer: () => PromiseLike<T>): PromiseLike<T> {
    if (!isReady()) {
      // 如果缓冲区满了，返回一个被拒绝的 Promise
      return Promise.reject(
        new SdkError('Not adding Promise because buffer limit was reached.'),
      );
    }

    const task = taskProducer();
    if (buffer.indexOf(task) === -1) {
      // 不在缓冲区才添加
      buffer.push(task);
    }

    // 无论成功还是失败都移除任务；失败由调用方自己处理
    void task.then(
      () => remove(task),
      () => remove(task),
    );
    return task;
  }

  /**
   * 等待缓冲区中的所有 Promise 任务完成，
   * 在指定的超时时间内未完成时返回 false，所有任务都完成则返回 true
   *
   * @param timeout 如果超时设为 0 或未传递，那么函数会等待所有 Promise 执行完毕
   */
  function drain(timeout?: number): PromiseLike<boolean> {
    return new Promise<boolean>((resolve) => {
      // 记录当前缓冲区中 Promise 的数量
      let counter = buffer.length;

      // 如果缓冲区中没有任务，立即返回 true
      if (!counter) {
        resolve(true);
        return;
      }

      // 超时后返回 false，表示未能在指定时间内完成所有任务
      const capturedSetTimeout =
        timeout && timeout > 0
          ? setTimeout(() => resolve(false), timeout)
          : undefined;

      const settle = (): void => {
        if (!--counter) {
          clearTimeout(capturedSetTimeout);
          resolve(true);
        }
      };

      // 任务失败同样算作完成，drain 只关心任务是否结束
      buffer.forEach((item) => {
        void Promise.resolve(item).then(settle, settle);
      });
    });
  }

  return {
    $: buffer,
    add,
    drain,
  };
}
