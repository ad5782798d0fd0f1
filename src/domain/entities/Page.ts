/** 頁內的段落 chunk（索引單位） */
export interface PageChunk {
  chunkIndex: number;
  text: string;
}
