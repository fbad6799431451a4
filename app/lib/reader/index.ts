import { and, asc, count, desc, eq, gt, lt } from "drizzle-orm";
import { books, chapters, type Book, type Chapter, type Db } from "../db";
import { NotFoundError } from "../errors";
import type { AppContext } from "../context";

export type Direction = "next" | "previous";

export interface BookSummary {
  book: Book;
  chapterCount: number;
}

export interface ChapterView {
  book: Book;
  chapter: Chapter;
  previous: Chapter | null;
  next: Chapter | null;
  chapters: Pick<Chapter, "id" | "title" | "order">[];
  /** Position to restore when this is the chapter the reader left off in */
  restorePosition: string;
}

export interface ProgressUpdate {
  position: string;
  chapterId?: string;
}

export interface ProgressReportEntry {
  title: string;
  lastChapter: string | null;
  position: string;
  totalChapters: number;
}

export async function requireBook(db: Db, bookId: string): Promise<Book> {
  const book = await db.select().from(books).where(eq(books.id, bookId)).get();
  if (!book) {
    throw new NotFoundError(`No book with id "${bookId}"`);
  }
  return book;
}

async function requireChapter(db: Db, bookId: string, chapterId: string): Promise<Chapter> {
  const chapter = await db
    .select()
    .from(chapters)
    .where(and(eq(chapters.id, chapterId), eq(chapters.bookId, bookId)))
    .get();
  if (!chapter) {
    throw new NotFoundError(`No chapter "${chapterId}" in this book`);
  }
  return chapter;
}

async function neighbour(db: Db, chapter: Chapter, direction: Direction): Promise<Chapter | null> {
  const found =
    direction === "next"
      ? await db
          .select()
          .from(chapters)
          .where(and(eq(chapters.bookId, chapter.bookId), gt(chapters.order, chapter.order)))
          .orderBy(asc(chapters.order))
          .get()
      : await db
          .select()
          .from(chapters)
          .where(and(eq(chapters.bookId, chapter.bookId), lt(chapters.order, chapter.order)))
          .orderBy(desc(chapters.order))
          .get();
  return found ?? null;
}

export async function listBooks(db: Db): Promise<BookSummary[]> {
  return db
    .select({ book: books, chapterCount: count(chapters.id) })
    .from(books)
    .leftJoin(chapters, eq(chapters.bookId, books.id))
    .groupBy(books.id)
    .orderBy(desc(books.uploadedAt))
    .all();
}

export async function getBookWithChapters(
  db: Db,
  bookId: string,
): Promise<{ book: Book; chapters: Chapter[] }> {
  const book = await requireBook(db, bookId);
  const list = await db
    .select()
    .from(chapters)
    .where(eq(chapters.bookId, bookId))
    .orderBy(asc(chapters.order))
    .all();
  return { book, chapters: list };
}

/**
 * Where `/book/:id/` sends the reader: the last chapter they read if it still
 * belongs to the book, else the first one. Null when the book has no chapters.
 */
export async function resolveLandingChapter(db: Db, bookId: string): Promise<Chapter | null> {
  const book = await requireBook(db, bookId);

  if (book.lastChapterId) {
    const last = await db
      .select()
      .from(chapters)
      .where(and(eq(chapters.id, book.lastChapterId), eq(chapters.bookId, bookId)))
      .get();
    if (last) return last;

    // The remembered chapter is gone; forget it
    await db.update(books).set({ lastChapterId: null }).where(eq(books.id, bookId));
  }

  const first = await db
    .select()
    .from(chapters)
    .where(eq(chapters.bookId, bookId))
    .orderBy(asc(chapters.order))
    .get();
  return first ?? null;
}

/**
 * Load one chapter for display. Opening a chapter other than the last one
 * read makes it the last one read and resets the position.
 */
export async function getChapterView(db: Db, bookId: string, chapterId: string): Promise<ChapterView> {
  let book = await requireBook(db, bookId);
  const chapter = await requireChapter(db, bookId, chapterId);

  const resuming = book.lastChapterId === chapter.id;
  if (!resuming) {
    const changes = { lastChapterId: chapter.id, lastPosition: "0" };
    await db.update(books).set(changes).where(eq(books.id, bookId));
    book = { ...book, ...changes };
  }

  const [previous, next, list] = await Promise.all([
    neighbour(db, chapter, "previous"),
    neighbour(db, chapter, "next"),
    db
      .select({ id: chapters.id, title: chapters.title, order: chapters.order })
      .from(chapters)
      .where(eq(chapters.bookId, bookId))
      .orderBy(asc(chapters.order))
      .all(),
  ]);

  return {
    book,
    chapter,
    previous,
    next,
    chapters: list,
    restorePosition: resuming ? book.lastPosition : "0",
  };
}

/**
 * The chapter before or after `chapterId`. At either end of the book the
 * chapter itself is returned.
 */
export async function getAdjacentChapter(
  db: Db,
  bookId: string,
  chapterId: string,
  direction: Direction,
): Promise<Chapter> {
  await requireBook(db, bookId);
  const chapter = await requireChapter(db, bookId, chapterId);
  return (await neighbour(db, chapter, direction)) ?? chapter;
}

/**
 * Overwrite the stored reading position. Last write wins; the server stamps
 * the time of the write.
 */
export async function updateProgress(db: Db, bookId: string, update: ProgressUpdate): Promise<Book> {
  const book = await requireBook(db, bookId);
  if (update.chapterId) {
    await requireChapter(db, bookId, update.chapterId);
  }

  const changes: Partial<Book> = {
    lastPosition: update.position,
    lastReadAt: new Date(),
  };
  if (update.chapterId) {
    changes.lastChapterId = update.chapterId;
  }

  await db.update(books).set(changes).where(eq(books.id, bookId));
  return { ...book, ...changes };
}

export async function getProgressReport(db: Db): Promise<ProgressReportEntry[]> {
  const summaries = await listBooks(db);
  const report: ProgressReportEntry[] = [];

  for (const { book, chapterCount } of summaries) {
    const lastChapter = book.lastChapterId
      ? await db
          .select({ title: chapters.title })
          .from(chapters)
          .where(and(eq(chapters.id, book.lastChapterId), eq(chapters.bookId, book.id)))
          .get()
      : undefined;

    report.push({
      title: book.title,
      lastChapter: lastChapter?.title ?? null,
      position: book.lastPosition,
      totalChapters: chapterCount,
    });
  }

  return report;
}

export function formatProgressReport(entries: ProgressReportEntry[]): string {
  let text = "Reading Progress Debug Info:\n\n";
  for (const entry of entries) {
    text += `Book: ${entry.title}\n`;
    text += `  Last Chapter: ${entry.lastChapter ?? "None"}\n`;
    text += `  Position: ${entry.position}\n`;
    text += `  Total Chapters: ${entry.totalChapters}\n\n`;
  }
  return text;
}

/** Delete a book, its chapters (by cascade) and its stored files. */
export async function deleteBook(ctx: Pick<AppContext, "db" | "storage">, bookId: string): Promise<Book> {
  const book = await requireBook(ctx.db, bookId);
  await ctx.db.delete(books).where(eq(books.id, bookId));
  ctx.storage.deleteBookFiles(book);
  console.log(`[Library] Deleted "${book.title}" (${book.id})`);
  return book;
}
