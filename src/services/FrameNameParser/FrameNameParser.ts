import type { FrameDescriptor } from "./FrameDescriptor";

export interface FrameNameParser {
  /**
   * 解析單一檔名。
   * 不符合命名慣例時回傳 null；這不是錯誤，呼叫端直接略過即可。
   */
  parse(name: string): FrameDescriptor | null;
}
