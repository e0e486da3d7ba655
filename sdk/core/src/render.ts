import type {
  Event,
  Exception,
  JsonCodec,
  NonPayloadEventKey,
  RenderedEvent,
  Request,
} from '@faultline/types';
import { dropNilKeys, sanitizeValues, toPlainObject, truncate } from '@faultline/utils';

/**
 * 消息的最大长度（字符数），与服务端对该字段的限制一致
 */
export const MAX_MESSAGE_LENGTH = 8192;

/** 不会跨越传输边界的内部字段 */
const NON_PAYLOAD_KEYS: readonly NonPayloadEventKey[] = [
  'source',
  'originalException',
];

/**
 * 把事件转换为可以直接序列化的普通对象
 *
 * 只处理存在的字段，值为 undefined 或 null 的顶层字段会被省略：
 * 1. 移除内部字段
 * 2. 把 message 截断到 {@link MAX_MESSAGE_LENGTH} 个字符
 * 3. 面包屑、sdk、request 展开为普通对象，request 额外移除值为空的键
 * 4. 清洗 extra、user、tags 中无法序列化的值
 * 5. 异常展开为普通对象，堆栈只保留帧列表
 *
 * 不会修改传入的事件
 */
export function renderEvent(event: Event, codec: JsonCodec): RenderedEvent {
  const payload = removeNonPayloadKeys(event);

  if (payload.message) {
    payload.message = truncate(payload.message, MAX_MESSAGE_LENGTH);
  }

  if (payload.breadcrumbs) {
    payload.breadcrumbs = payload.breadcrumbs.map(toPlainObject);
  }

  if (payload.sdk) {
    payload.sdk = toPlainObject(payload.sdk);
  }

  if (payload.request) {
    payload.request = renderRequest(payload.request);
  }

  if (payload.extra) {
    payload.extra = sanitizeValues(payload.extra, codec);
  }

  if (payload.user) {
    payload.user = sanitizeValues(payload.user, codec);
  }

  if (payload.tags) {
    payload.tags = sanitizeValues(payload.tags, codec);
  }

  if (payload.exception) {
    payload.exception = payload.exception.map(renderException);
  }

  return payload;
}

/**
 * 浅拷贝事件，同时移除内部字段和值为空的字段
 */
function removeNonPayloadKeys(event: Event): RenderedEvent {
  const payload: Event = dropNilKeys(event);

  for (const key of NON_PAYLOAD_KEYS) {
    delete payload[key];
  }

  return payload;
}

function renderRequest(request: Request): Request {
  return dropNilKeys(toPlainObject(request));
}

function renderException(exception: Exception): Exception {
  const rendered = toPlainObject(exception);

  if (rendered.stacktrace) {
    rendered.stacktrace = {
      frames: rendered.stacktrace.frames.map(toPlainObject),
    };
  }

  return rendered;
}
