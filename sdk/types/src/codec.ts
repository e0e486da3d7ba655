/** 编码的结果，成功时携带编码后的文本，失败时携带原因 */
export type EncodeResult =
  | { ok: true; value: string }
  | { ok: false; error: unknown };

/**
 * 序列化工具，清洗事件和编码信封时都会用到
 *
 * encode 不允许抛出异常，无法编码的值通过返回 `{ ok: false }` 表示
 */
export interface JsonCodec {
  encode(value: unknown): EncodeResult;
}
