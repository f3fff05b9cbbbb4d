import { frameExtension, frameNamePrefix } from "@/constants";

import type { FrameDescriptor } from "./FrameDescriptor";

export function normalizeExtension(extension: string) {
  const lower = extension.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * 由 descriptor 產生新檔名：`ckt-<family>-<size>-<variant>-<tone>.png`，全小寫。
 *
 * 這是有損轉換：`small far` 與未標註取景都會得到 `full`，
 * 而產生出來的檔名在 tone 前沒有空白，不會再被 parser 接受。
 */
export function buildFrameName(
  descriptor: FrameDescriptor,
  extension: string = frameExtension
) {
  const { family, size, variant, tone } = descriptor;
  return `${frameNamePrefix}-${family}-${size}-${variant}-${tone}${normalizeExtension(
    extension
  )}`.toLowerCase();
}
