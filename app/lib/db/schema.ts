import { sqliteTable, text, integer, index, uniqueIndex } from "drizzle-orm/sqlite-core";
import { relations } from "drizzle-orm";

// Books table
export const books = sqliteTable(
  "books",
  {
    id: text("id").primaryKey(),

    // Metadata
    title: text("title").notNull(),
    author: text("author"),

    // Stored files (paths relative to the media root)
    filePath: text("file_path").notNull(),
    fileName: text("file_name").notNull(),
    fileSize: integer("file_size").notNull(),
    coverPath: text("cover_path"),
    coverColor: text("cover_color"),
    stylesheetPath: text("stylesheet_path"),

    // Reading state
    lastPosition: text("last_position").notNull().default("0"),
    lastChapterId: text("last_chapter_id"),
    lastReadAt: integer("last_read_at", { mode: "timestamp_ms" }),

    uploadedAt: integer("uploaded_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index("idx_books_uploaded_at").on(table.uploadedAt)],
);

// Chapters table
export const chapters = sqliteTable(
  "chapters",
  {
    id: text("id").primaryKey(),
    bookId: text("book_id")
      .notNull()
      .references(() => books.id, { onDelete: "cascade" }),
    title: text("title").notNull(),
    content: text("content").notNull(),
    order: integer("order").notNull(),
  },
  (table) => [uniqueIndex("idx_chapters_book_order").on(table.bookId, table.order)],
);

export const booksRelations = relations(books, ({ many }) => ({
  chapters: many(chapters),
}));

export const chaptersRelations = relations(chapters, ({ one }) => ({
  book: one(books, { fields: [chapters.bookId], references: [books.id] }),
}));

// Type exports
export type Book = typeof books.$inferSelect;
export type NewBook = typeof books.$inferInsert;
export type Chapter = typeof chapters.$inferSelect;
export type NewChapter = typeof chapters.$inferInsert;
