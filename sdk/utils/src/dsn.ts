import type { DsnComponents, DsnLike, DsnProtocol } from '@faultline/types';

import { DEBUG_BUILD } from './debug-build';
import { logger } from './logger';

/** 解析 DSN 字符串的正则 */
const DSN_REGEX =
  /^(?:(\w+):)\/\/(?:(\w+)(?::(\w+)?)?@)([\w.-]+)(?::(\d+))?\/(.+)/;

function isValidProtocol(protocol?: string): protocol is DsnProtocol {
  return protocol === 'http' || protocol === 'https';
}

/**
 * 将 DSN 组件转换为字符串
 *
 * @param withPassword 为 true 时在结果中包含私钥
 */
export function dsnToString(
  dsn: DsnComponents,
  withPassword: boolean = false,
): string {
  const { host, path, pass, port, projectId, protocol, publicKey } = dsn;
  return (
    `${protocol}://${publicKey || ''}${withPassword && pass ? `:${pass}` : ''}` +
    `@${host}${port ? `:${port}` : ''}/${path ? `${path}/` : ''}${projectId}`
  );
}

/**
 * 将 DSN 字符串解析为组件，无法解析时返回 undefined
 */
export function dsnFromString(str: string): DsnComponents | undefined {
  const match = DSN_REGEX.exec(str);

  if (!match) {
    DEBUG_BUILD && logger.error(`Invalid DSN: ${str}`);
    return undefined;
  }

  const [protocol, publicKey, pass = '', host = '', port = '', lastPath = ''] =
    match.slice(1);
  let path = '';
  let projectId = lastPath;

  // 最后一段是项目 ID，前面的部分是服务挂载的子路径
  const split = projectId.split('/');
  if (split.length > 1) {
    path = split.slice(0, -1).join('/');
    projectId = split.pop() || '';
  }

  // 去掉项目 ID 后面的查询参数
  if (projectId) {
    const projectMatch = projectId.match(/^\d+/);
    if (projectMatch) {
      projectId = projectMatch[0];
    }
  }

  if (!isValidProtocol(protocol)) {
    DEBUG_BUILD && logger.error(`Invalid DSN protocol: ${protocol}`);
    return undefined;
  }

  return dsnFromComponents({
    host,
    pass,
    path,
    projectId,
    port,
    protocol,
    publicKey,
  });
}

function dsnFromComponents(components: DsnComponents): DsnComponents {
  return {
    protocol: components.protocol,
    publicKey: components.publicKey || '',
    pass: components.pass || '',
    host: components.host,
    port: components.port || '',
    path: components.path || '',
    projectId: components.projectId,
  };
}

/** 校验 DSN 组件是否完整有效 */
function validateDsn(dsn: DsnComponents): boolean {
  const { port, projectId, protocol } = dsn;

  const requiredComponents: ReadonlyArray<keyof DsnComponents> = [
    'protocol',
    'publicKey',
    'host',
    'projectId',
  ];
  const missing = requiredComponents.find((component) => !dsn[component]);
  if (missing) {
    DEBUG_BUILD && logger.error(`Invalid DSN: ${missing} missing`);
    return false;
  }

  if (!projectId.match(/^\d+$/)) {
    DEBUG_BUILD && logger.error(`Invalid DSN: Invalid projectId ${projectId}`);
    return false;
  }

  if (!isValidProtocol(protocol)) {
    DEBUG_BUILD && logger.error(`Invalid DSN: Invalid protocol ${protocol}`);
    return false;
  }

  if (port && isNaN(parseInt(port, 10))) {
    DEBUG_BUILD && logger.error(`Invalid DSN: Invalid port ${port}`);
    return false;
  }

  return true;
}

/**
 * 根据字符串或组件创建一个有效的 DSN，无效时返回 undefined
 */
export function makeDsn(from: DsnLike): DsnComponents | undefined {
  const components =
    typeof from === 'string' ? dsnFromString(from) : dsnFromComponents(from);
  if (!components || !validateDsn(components)) {
    return undefined;
  }
  return components;
}

/**
 * 返回 DSN 对应的信封上报地址
 */
export function getEnvelopeEndpoint(dsn: DsnComponents): string {
  const port = dsn.port ? `:${dsn.port}` : '';
  const path = dsn.path ? `/${dsn.path}` : '';
  return `${dsn.protocol}://${dsn.host}${port}${path}/api/${dsn.projectId}/envelope/`;
}
