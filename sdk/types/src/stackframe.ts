/** 堆栈中的一帧 */
export interface StackFrame {
  filename?: string;
  function?: string;
  module?: string;
  platform?: string;
  lineno?: number;
  colno?: number;
  abs_path?: string;
  context_line?: string;
  pre_context?: string[];
  post_context?: string[];
  // 是否属于应用自身的代码，用于在 UI 中折叠第三方帧
  in_app?: boolean;
  instruction_addr?: string;
  addr_mode?: string;
  package?: string;
  symbol?: string;
  symbol_addr?: string;
  image_addr?: string;
  // 帧中的局部变量
  vars?: { [key: string]: unknown };
}
