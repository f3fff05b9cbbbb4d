import { frameExtension } from "@/constants";

import {
  type FrameDescriptor,
  type FrameFamily,
  type FrameTone,
  type FrameVariant,
  frameTones,
} from "./FrameDescriptor";
import { normalizeExtension } from "./FrameNameFormat";
import type { FrameNameParser } from "./FrameNameParser";

const toneRegex = /\s+(light|dark)$/i;
// 刻意只接受 ASCII 數字：新檔名的尺寸欄位必須是 0-9
const sizeRegex = /(\d{2,4}x\d{2,4})/i;

/** 非 ASCII 字母也算字元，`CKTé` 不視為以 `ckt` 這個字開頭 */
const wordChar = "[\\p{L}\\p{N}_]";

/** 比對完整的字（或以空白分隔的片語），不分大小寫 */
function wholeWord(phrase: string, options: { atStart?: boolean } = {}) {
  const before = options.atStart ? "^" : `(?<!${wordChar})`;
  return new RegExp(`${before}${phrase}(?!${wordChar})`, "iu");
}

/** 依序比對，先命中者為準 */
const familyKeywords: ReadonlyArray<{ family: FrameFamily; pattern: RegExp }> =
  [
    { family: "template", pattern: wholeWord("template") },
    { family: "aquarell", pattern: wholeWord("aquarell") },
  ];

/**
 * 沒有宣告 family、但以 CKT 開頭的檔名一律視為 template。
 * 例如 `CKT 90x90 dark.png`。
 */
const prefixFallback: { family: FrameFamily; pattern: RegExp } = {
  family: "template",
  pattern: wholeWord("ckt", { atStart: true }),
};

/**
 * 依序比對，先命中者為準：`cropped` 與 `small close` 同時出現時取 crop。
 * `small far` 明確對應 full，與沒有任何標註相同。
 */
const variantKeywords: ReadonlyArray<{
  variant: FrameVariant;
  pattern: RegExp;
}> = [
  { variant: "crop", pattern: wholeWord("cropped") },
  { variant: "close", pattern: wholeWord("small close") },
  { variant: "full", pattern: wholeWord("small far") },
];

const defaultVariant: FrameVariant = "full";

/**
 * 解析人工命名的外框檔名，例如：
 * - `CKT template 90x90 cropped light.png`
 * - `CKT template small close 60x50 dark.png`
 * - `CKT aquarell small far 120x80 light.png`
 *
 * 每一步失敗即回傳 null，不會產生部分結果。
 */
export class FrameNameParserDefault implements FrameNameParser {
  private readonly extension: string;

  constructor(options: { extension?: string } = {}) {
    this.extension = normalizeExtension(options.extension ?? frameExtension);
  }

  parse(name: string): FrameDescriptor | null {
    const base = stripExtension(name, this.extension);
    if (base === null) return null;

    const toned = splitTone(collapseWhitespace(base));
    if (toned === null) return null;

    const size = findSize(toned.rest);
    if (size === null) return null;

    const family = detectFamily(toned.rest);
    if (family === null) return null;

    return {
      originalName: name,
      family,
      size,
      variant: detectVariant(toned.rest),
      tone: toned.tone,
    };
  }
}

function stripExtension(name: string, extension: string): string | null {
  if (!name.toLowerCase().endsWith(extension)) return null;
  return name.slice(0, name.length - extension.length);
}

function collapseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

function splitTone(value: string): { tone: FrameTone; rest: string } | null {
  const match = toneRegex.exec(value);
  if (!match) return null;
  const lowered = match[1].toLowerCase();
  const tone = frameTones.find((t) => t === lowered);
  if (!tone) return null;
  return { tone, rest: value.slice(0, match.index).trim() };
}

function findSize(value: string): string | null {
  const match = sizeRegex.exec(value);
  return match ? match[1].toLowerCase() : null;
}

function detectFamily(value: string): FrameFamily | null {
  const declared = familyKeywords.find((k) => k.pattern.test(value));
  if (declared) return declared.family;
  if (prefixFallback.pattern.test(value)) return prefixFallback.family;
  return null;
}

function detectVariant(value: string): FrameVariant {
  return (
    variantKeywords.find((k) => k.pattern.test(value))?.variant ??
    defaultVariant
  );
}
