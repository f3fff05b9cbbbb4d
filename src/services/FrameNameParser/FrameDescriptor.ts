export const frameFamilies = ["template", "aquarell"] as const;
export type FrameFamily = (typeof frameFamilies)[number];

export const frameVariants = ["full", "crop", "close"] as const;
export type FrameVariant = (typeof frameVariants)[number];

export const frameTones = ["light", "dark"] as const;
export type FrameTone = (typeof frameTones)[number];

export type FrameDescriptor = {
  /** 原始檔名，未經任何修改 */
  originalName: string;

  family: FrameFamily;

  /** 小寫的 `WxH`，每邊 2 到 4 位數，例如 `90x90` */
  size: string;

  /** 取景：完整 / 裁切 / 近拍 */
  variant: FrameVariant;

  /** 明暗版本 */
  tone: FrameTone;
};
