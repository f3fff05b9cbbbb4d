/** 唯一處理的檔案格式 */
export const frameExtension = ".png";

/** 新檔名的固定前綴 */
export const frameNamePrefix = "ckt";
