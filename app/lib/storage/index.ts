import { mkdirSync, writeFileSync, existsSync, unlinkSync, rmSync, statSync } from "fs";
import { readFile } from "fs/promises";
import { resolve, dirname, relative, isAbsolute } from "path";
import type { Book } from "../db/schema";

/**
 * Blob storage under a media root. Every path handed out or accepted is
 * relative to the root (e.g. "epubs/<id>.epub") and is what the database stores.
 */
export interface BlobStorage {
  readonly root: string;
  storeBookFile(buffer: Buffer, bookId: string): string;
  storeCoverImage(buffer: Buffer, bookId: string): string;
  storeBookImage(buffer: Buffer, bookId: string, fileName: string): string;
  storeStylesheet(css: string, bookId: string): string;
  deleteFile(relativePath: string): boolean;
  deleteBookFiles(book: Pick<Book, "id" | "filePath" | "coverPath">): void;
  resolveStoragePath(relativePath: string): string | null;
  readStoredFile(relativePath: string): Promise<Buffer | null>;
}

export function bookFilePath(bookId: string): string {
  return `epubs/${bookId}.epub`;
}

export function coverImagePath(bookId: string): string {
  return `covers/${bookId}.jpg`;
}

export function bookImagePath(bookId: string, fileName: string): string {
  return `book_images/${bookId}/${fileName}`;
}

export function stylesheetPath(bookId: string): string {
  return `book_css/${bookId}/styles.css`;
}

/** URL the media route serves a stored file under */
export function mediaUrl(relativePath: string): string {
  return `/media/${relativePath}`;
}

export function createStorage(mediaRoot: string): BlobStorage {
  const root = resolve(process.cwd(), mediaRoot);
  mkdirSync(root, { recursive: true });

  /**
   * Resolve a stored path to an absolute one, refusing anything that
   * escapes the media root.
   */
  function resolveStoragePath(relativePath: string): string | null {
    if (!relativePath || isAbsolute(relativePath)) return null;
    const absolutePath = resolve(root, relativePath);
    const fromRoot = relative(root, absolutePath);
    if (!fromRoot || fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
      return null;
    }
    return absolutePath;
  }

  function write(relativePath: string, data: Buffer | string): string {
    const absolutePath = resolveStoragePath(relativePath);
    if (!absolutePath) {
      throw new Error(`Refusing to write outside the media root: ${relativePath}`);
    }
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, data);
    return relativePath;
  }

  function deleteFile(relativePath: string): boolean {
    try {
      const absolutePath = resolveStoragePath(relativePath);
      if (absolutePath && existsSync(absolutePath)) {
        unlinkSync(absolutePath);
        return true;
      }
      return false;
    } catch (error) {
      console.warn(`[Storage] Could not delete ${relativePath}:`, error);
      return false;
    }
  }

  function deleteDirectory(relativePath: string): void {
    const absolutePath = resolveStoragePath(relativePath);
    if (absolutePath) {
      rmSync(absolutePath, { recursive: true, force: true });
    }
  }

  return {
    root,
    resolveStoragePath,
    deleteFile,

    storeBookFile: (buffer, bookId) => write(bookFilePath(bookId), buffer),
    storeCoverImage: (buffer, bookId) => write(coverImagePath(bookId), buffer),
    storeBookImage: (buffer, bookId, fileName) => write(bookImagePath(bookId, fileName), buffer),
    storeStylesheet: (css, bookId) => write(stylesheetPath(bookId), css),

    deleteBookFiles(book) {
      deleteFile(book.filePath);
      if (book.coverPath) {
        deleteFile(book.coverPath);
      }
      deleteDirectory(`book_images/${book.id}`);
      deleteDirectory(`book_css/${book.id}`);
    },

    async readStoredFile(relativePath) {
      const absolutePath = resolveStoragePath(relativePath);
      if (!absolutePath || !existsSync(absolutePath) || !statSync(absolutePath).isFile()) {
        return null;
      }
      return readFile(absolutePath);
    },
  };
}
