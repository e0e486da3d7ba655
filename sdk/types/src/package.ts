/** SDK 依赖的包 */
export interface Package {
  // 依赖包的名称
  name: string;
  // 依赖包的版本号
  version: string;
}
