export interface ExtractedChapter {
  title: string;
  /** Sanitized inner markup of the document body */
  content: string;
  /** Path of the source document inside the container */
  href: string;
}

export interface ExtractedImage {
  fileName: string;
  mediaType: string;
  data: Buffer;
}

export interface ExtractedCover {
  href: string;
  mediaType: string;
  data: Buffer;
}

export interface ExtractedBook {
  title: string;
  author: string;
  cover: ExtractedCover | null;
  chapters: ExtractedChapter[];
  images: ExtractedImage[];
  /** Book CSS scoped under `.epub-content`, empty when the book ships none */
  stylesheet: string;
}

export interface ExtractOptions {
  /** Used when the package document carries no title */
  fallbackTitle?: string;
  resolveImageUrl?: (fileName: string) => string;
  resolveChapterLink?: (chapterIndex: number) => string;
}

export interface CoverResult {
  buffer: Buffer;
  mimeType: string;
  dominantColor?: string;
}

export interface UploadedFile {
  fileName: string;
  contentType: string;
  data: Buffer;
}

export interface ImportResult {
  bookId: string;
  title: string;
  chapterCount: number;
}

export type PageFormat = "standard" | "mobile";
export type ExportQuality = "standard" | "high" | "print";

export interface ExportOptions {
  format: PageFormat;
  quality: ExportQuality;
}

export interface ExportResult {
  fileName: string;
  data: Uint8Array;
}
