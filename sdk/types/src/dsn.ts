/** DSN 中支持的协议 */
export type DsnProtocol = 'http' | 'https';

/** DSN 的各个组成部分 */
export interface DsnComponents {
  /** 协议 */
  protocol: DsnProtocol;
  /** 公钥，用于鉴权 */
  publicKey?: string;
  /** 私钥（已废弃，仅为兼容旧格式保留） */
  pass?: string;
  /** 主机名 */
  host: string;
  /** 端口 */
  port?: string;
  /** 服务挂载的子路径 */
  path?: string;
  /** 项目 ID */
  projectId: string;
}

/** DSN 可以是字符串形式，也可以是已经解析好的组件 */
export type DsnLike = string | DsnComponents;
