import { describe, expect, test } from "vitest";

import { FrameNameParserDefault } from "@/services/FrameNameParser";

describe("FrameNameParserDefault", () => {
  const parser = new FrameNameParserDefault();

  test("cropped → crop", () => {
    expect(parser.parse("CKT template 90x90 cropped light.png")).toEqual({
      originalName: "CKT template 90x90 cropped light.png",
      family: "template",
      size: "90x90",
      variant: "crop",
      tone: "light",
    });
  });

  test("small close → close", () => {
    expect(parser.parse("CKT template small close 60x50 dark.png")).toEqual({
      originalName: "CKT template small close 60x50 dark.png",
      family: "template",
      size: "60x50",
      variant: "close",
      tone: "dark",
    });
  });

  test("small far 與未標註取景都是 full", () => {
    expect(parser.parse("CKT template small far 60x50 light.png")?.variant).toBe(
      "full"
    );
    expect(parser.parse("CKT template 60x50 light.png")?.variant).toBe("full");
  });

  test("大小寫不敏感，欄位一律轉小寫", () => {
    const parsed = parser.parse("CKT TEMPLATE 90X90 CROPPED LIGHT.PNG");
    expect(parsed).toEqual({
      originalName: "CKT TEMPLATE 90X90 CROPPED LIGHT.PNG",
      family: "template",
      size: "90x90",
      variant: "crop",
      tone: "light",
    });
  });

  test("連續空白視為單一空白", () => {
    const parsed = parser.parse(
      "  CKT   aquarell\t120x80   small far  dark.png"
    );
    expect(parsed).toEqual({
      originalName: "  CKT   aquarell\t120x80   small far  dark.png",
      family: "aquarell",
      size: "120x80",
      variant: "full",
      tone: "dark",
    });
  });

  test("沒有宣告 family 但以 CKT 開頭 → template", () => {
    expect(parser.parse("CKT 90x90 dark.png")?.family).toBe("template");
  });

  test("CKT 必須是完整的字", () => {
    expect(parser.parse("CKTX 90x90 dark.png")).toBeNull();
  });

  test("非 ASCII 字母緊接在關鍵字後不算完整的字", () => {
    expect(parser.parse("CKTé 90x90 dark.png")).toBeNull();
    expect(parser.parse("templateé 90x90 dark.png")).toBeNull();
    expect(parser.parse("aquarellé 90x90 dark.png")).toBeNull();
    expect(parser.parse("CKT template 90x90 croppedé light.png")?.variant).toBe(
      "full"
    );
    expect(
      parser.parse("CKT template ésmall close 90x90 light.png")?.variant
    ).toBe("full");
  });

  test("family 必須是完整的字", () => {
    expect(parser.parse("my templates 90x90 light.png")).toBeNull();
    expect(parser.parse("frame 90x90 dark.png")).toBeNull();
  });

  test("尺寸取第一個符合的片段，可出現在任何位置", () => {
    expect(parser.parse("CKT template 40x40 to 90x90 dark.png")?.size).toBe(
      "40x40"
    );
    expect(parser.parse("CKT template size90x90px light.png")?.size).toBe(
      "90x90"
    );
  });

  test("尺寸只接受 ASCII 數字", () => {
    expect(parser.parse("CKT template ٩٠x٩٠ dark.png")).toBeNull();
    expect(parser.parse("CKT template ９０x９０ dark.png")).toBeNull();
  });

  test("cropped 與 small close 同時出現時取 crop", () => {
    expect(
      parser.parse("CKT template small close cropped 90x90 light.png")?.variant
    ).toBe("crop");
  });

  test("不符合命名慣例 → null", () => {
    expect(parser.parse("random_icon.png")).toBeNull();
    expect(parser.parse(".png")).toBeNull();
    // 缺少尺寸
    expect(parser.parse("CKT template cropped light.png")).toBeNull();
    // tone 不在結尾
    expect(parser.parse("CKT template light 90x90.png")).toBeNull();
    // tone 前沒有空白
    expect(parser.parse("CKT template 90x90-light.png")).toBeNull();
    // 副檔名不符
    expect(parser.parse("CKT template 90x90 light.jpg")).toBeNull();
  });

  test("新命名的檔名不會再被接受", () => {
    expect(parser.parse("ckt-template-90x90-crop-light.png")).toBeNull();
  });

  test("同一輸入的結果相同", () => {
    const name = "CKT aquarell small close 120x80 dark.png";
    expect(parser.parse(name)).toEqual(parser.parse(name));
  });

  test("可指定其他副檔名", () => {
    const webp = new FrameNameParserDefault({ extension: "webp" });
    expect(webp.parse("CKT template 90x90 light.webp")?.size).toBe("90x90");
    expect(webp.parse("CKT template 90x90 light.png")).toBeNull();
  });
});
