import { basename, extname } from "path";
import { v4 as uuid } from "uuid";

import { books, chapters } from "../db";
import { bookFilePath, bookImagePath, coverImagePath, mediaUrl, stylesheetPath } from "../storage";
import { FileTooLargeError, UnsupportedFormatError } from "../errors";
import { extractEpub } from "./epub";
import { processCover } from "./cover";
import type { AppContext } from "../context";
import type { ImportResult, UploadedFile } from "../types";

const EPUB_EXTENSION = ".epub";
const ACCEPTED_CONTENT_TYPES = new Set(["", "application/epub+zip", "application/octet-stream"]);

/**
 * Reject uploads before any parsing happens: size first, then extension and
 * declared content type.
 */
export function validateUpload(upload: UploadedFile, maxUploadBytes: number): void {
  if (upload.data.length > maxUploadBytes) {
    throw new FileTooLargeError(maxUploadBytes);
  }

  if (!upload.fileName.toLowerCase().endsWith(EPUB_EXTENSION)) {
    throw new UnsupportedFormatError();
  }

  const contentType = upload.contentType.split(";")[0].trim().toLowerCase();
  if (!ACCEPTED_CONTENT_TYPES.has(contentType)) {
    throw new UnsupportedFormatError(`Unsupported content type "${contentType}". Please upload an EPUB file.`);
  }
}

/**
 * Validate, extract and persist an uploaded EPUB. The Book row, its Chapter
 * rows and every stored file are created together or not at all.
 */
export async function importBook(
  ctx: Pick<AppContext, "db" | "storage" | "config">,
  upload: UploadedFile,
): Promise<ImportResult> {
  const startTime = Date.now();
  validateUpload(upload, ctx.config.maxUploadBytes);

  // Ids are assigned up front so extracted links can point at their final URLs
  const bookId = uuid();
  const chapterIds: string[] = [];
  const chapterId = (index: number) => (chapterIds[index] ??= uuid());

  const extracted = await extractEpub(upload.data, {
    fallbackTitle: basename(upload.fileName, extname(upload.fileName)),
    resolveImageUrl: (fileName) => mediaUrl(bookImagePath(bookId, fileName)),
    resolveChapterLink: (index) => `/book/${bookId}/chapter/${chapterId(index)}/`,
  });

  const cover = extracted.cover ? await processCover(extracted.cover.data) : null;

  const { db, storage } = ctx;
  try {
    // Rows are inserted before any file is written
    db.transaction((tx) => {
      tx.insert(books)
        .values({
          id: bookId,
          title: extracted.title,
          author: extracted.author,
          filePath: bookFilePath(bookId),
          fileName: upload.fileName,
          fileSize: upload.data.length,
          coverPath: cover ? coverImagePath(bookId) : null,
          coverColor: cover?.dominantColor ?? null,
          stylesheetPath: extracted.stylesheet ? stylesheetPath(bookId) : null,
        })
        .run();

      extracted.chapters.forEach((chapter, index) => {
        tx.insert(chapters)
          .values({
            id: chapterId(index),
            bookId,
            title: chapter.title,
            content: chapter.content,
            order: index,
          })
          .run();
      });

      storage.storeBookFile(upload.data, bookId);
      if (cover) storage.storeCoverImage(cover.buffer, bookId);
      for (const image of extracted.images) {
        storage.storeBookImage(image.data, bookId, image.fileName);
      }
      if (extracted.stylesheet) storage.storeStylesheet(extracted.stylesheet, bookId);
    });
  } catch (error) {
    // The transaction rolled back; remove whatever reached the disk
    storage.deleteBookFiles({
      id: bookId,
      filePath: bookFilePath(bookId),
      coverPath: coverImagePath(bookId),
    });
    console.error(`[Import] Failed to store "${upload.fileName}":`, error);
    throw error;
  }

  console.log(
    `[Import] "${extracted.title}" imported as ${bookId}: ${extracted.chapters.length} chapters in ${Date.now() - startTime}ms`,
  );

  return {
    bookId,
    title: extracted.title,
    chapterCount: extracted.chapters.length,
  };
}
