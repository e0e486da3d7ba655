/** 事件关联的用户信息，除固定字段外可以携带任意数据 */
export interface User {
  [key: string]: unknown;
  id?: string | number;
  ip_address?: string;
  email?: string;
  username?: string;
}
