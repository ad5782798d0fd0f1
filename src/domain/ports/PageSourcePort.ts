/** 已擷取文字的頁面檔案來源（OCR 產出，不在本系統範圍內） */
export interface PageSourcePort {
  directoryExists(dirPath: string): Promise<boolean>;
  listPageFiles(dirPath: string): Promise<string[]>;
  readFile(filePath: string): Promise<string>;
}
