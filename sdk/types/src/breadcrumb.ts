import type { SeverityLevel } from './severity';

/**
 * 面包屑用于记录问题发生之前的一条事件轨迹，帮助开发者回溯导致错误的操作和状态
 *
 * 与传统日志相比，面包屑可以携带结构化的数据（类型、级别、类别、时间戳以及任意上下文）
 *
 * 渲染时面包屑会被展开成普通对象，不做进一步的清洗
 */
export interface Breadcrumb {
  /** 面包屑的类型，默认是 default */
  type?: string;

  /** 严重性级别，从高到低依次是 fatal、error、warning、info、debug */
  level?: SeverityLevel;

  /** 面包屑所属事件的 id */
  event_id?: string;

  /**
   * 描述面包屑来源的点分字符串，例如 `ui.click`、`http`
   */
  category?: string;

  /** 面包屑的可读消息，原样保留空白字符 */
  message?: string;

  /** 与面包屑相关的任意数据，内容依赖于面包屑的类型 */
  data?: { [key: string]: unknown };

  /** 面包屑记录的时间，单位为秒的时间戳 */
  timestamp?: number;
}
