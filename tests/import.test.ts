import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readdirSync } from "fs";
import { join } from "path";
import { count } from "drizzle-orm";

import { importBook, validateUpload } from "../app/lib/processing";
import { books, chapters } from "../app/lib/db";
import {
  FileTooLargeError,
  MalformedInputError,
  UnsupportedFormatError,
} from "../app/lib/errors";
import type { UploadedFile } from "../app/lib/types";
import { buildEpub, sampleChapters, solidPng } from "./helpers/epub";
import { chaptersOf, createTestContext, getBook, type TestContext } from "./helpers/context";

function upload(data: Buffer, fileName = "sample.epub", contentType = "application/epub+zip"): UploadedFile {
  return { fileName, contentType, data };
}

async function bookCount(ctx: TestContext): Promise<number> {
  const row = await ctx.db.select({ value: count() }).from(books).get();
  return row?.value ?? 0;
}

describe("validateUpload", () => {
  const data = Buffer.from("PK");

  it("should accept .epub files with EPUB or generic content types", () => {
    expect(() => validateUpload(upload(data, "Book.EPUB"), 100)).not.toThrow();
    expect(() => validateUpload(upload(data, "book.epub", "application/octet-stream"), 100)).not.toThrow();
    expect(() => validateUpload(upload(data, "book.epub", ""), 100)).not.toThrow();
  });

  it("should reject other extensions and content types", () => {
    expect(() => validateUpload(upload(data, "notes.txt", "text/plain"), 100)).toThrow(UnsupportedFormatError);
    expect(() => validateUpload(upload(data, "book.epub", "text/plain"), 100)).toThrow(UnsupportedFormatError);
  });

  it("should check the size before anything else", () => {
    expect(() => validateUpload(upload(Buffer.alloc(101), "notes.txt"), 100)).toThrow(FileTooLargeError);
  });
});

describe("importBook", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it("should create one chapter per spine item, ordered 0..K-1", async () => {
    const result = await importBook(ctx, upload(await buildEpub({ chapters: sampleChapters() })));

    expect(result.title).toBe("Sample Book");
    expect(result.chapterCount).toBe(3);

    const stored = await chaptersOf(ctx.db, result.bookId);
    expect(stored.map((c) => c.order)).toEqual([0, 1, 2]);
    expect(stored.map((c) => c.title)).toEqual(["One", "Two", "Three"]);
    expect(stored[1].content).toBe("<h1>Two</h1><p>Second</p>");

    const book = await getBook(ctx.db, result.bookId);
    expect(book?.author).toBe("Ann Author");
    expect(book?.fileName).toBe("sample.epub");
    expect(book?.filePath).toBe(`epubs/${result.bookId}.epub`);
    expect(book?.lastPosition).toBe("0");
    expect(book?.lastChapterId).toBeNull();
    expect(existsSync(join(ctx.storage.root, "epubs", `${result.bookId}.epub`))).toBe(true);
  });

  it("should import the same file twice as two independent books", async () => {
    const epub = await buildEpub({ chapters: sampleChapters() });
    const first = await importBook(ctx, upload(epub));
    const second = await importBook(ctx, upload(epub));

    expect(first.bookId).not.toBe(second.bookId);
    expect(await bookCount(ctx)).toBe(2);

    const firstIds = (await chaptersOf(ctx.db, first.bookId)).map((c) => c.id);
    const secondIds = (await chaptersOf(ctx.db, second.bookId)).map((c) => c.id);
    expect(firstIds.filter((id) => secondIds.includes(id))).toEqual([]);
  });

  it("should use the file name when the book has no title", async () => {
    const result = await importBook(
      ctx,
      upload(await buildEpub({ title: null, chapters: sampleChapters() }), "my-novel.epub"),
    );

    expect(result.title).toBe("my-novel");
  });

  it("should link chapters to each other by their stored ids", async () => {
    const result = await importBook(
      ctx,
      upload(
        await buildEpub({
          chapters: [
            { file: "one.xhtml", body: '<p><a href="two.xhtml">Next</a></p>' },
            { file: "two.xhtml", body: "<p>Second</p>" },
          ],
        }),
      ),
    );

    const [one, two] = await chaptersOf(ctx.db, result.bookId);
    expect(one.content).toBe(`<p><a href="/book/${result.bookId}/chapter/${two.id}/">Next</a></p>`);
  });

  it("should store images, the cover and the scoped stylesheet", async () => {
    const png = await solidPng(40, 60);
    const result = await importBook(
      ctx,
      upload(
        await buildEpub({
          chapters: [{ file: "one.xhtml", body: '<p><img src="../images/pic.png" alt=""/></p>' }],
          resources: [
            { id: "pic", href: "images/pic.png", mediaType: "image/png", data: png },
            { id: "cover", href: "images/cover.png", mediaType: "image/png", data: png, properties: "cover-image" },
            { id: "css", href: "styles/book.css", mediaType: "text/css", data: "p { text-indent: 1em }" },
          ],
        }),
      ),
    );

    const book = await getBook(ctx.db, result.bookId);
    expect(book?.coverPath).toBe(`covers/${result.bookId}.jpg`);
    expect(book?.coverColor).toBe("#336699");
    expect(book?.stylesheetPath).toBe(`book_css/${result.bookId}/styles.css`);

    const css = await ctx.storage.readStoredFile(`book_css/${result.bookId}/styles.css`);
    expect(css?.toString("utf8")).toBe(".epub-content p { text-indent: 1em }");

    const image = await ctx.storage.readStoredFile(`book_images/${result.bookId}/pic.png`);
    expect(image?.equals(png)).toBe(true);

    const [chapter] = await chaptersOf(ctx.db, result.bookId);
    expect(chapter.content).toContain(`src="/media/book_images/${result.bookId}/pic.png"`);
  });

  it("should reject uploads over the size limit without creating a book", async () => {
    const tooBig = Buffer.alloc(50 * 1024 * 1024 + 1);

    await expect(importBook(ctx, upload(tooBig))).rejects.toBeInstanceOf(FileTooLargeError);
    expect(await bookCount(ctx)).toBe(0);
  });

  it("should reject unreadable EPUBs without creating a book", async () => {
    await expect(importBook(ctx, upload(Buffer.from("this is not an epub file")))).rejects.toBeInstanceOf(
      MalformedInputError,
    );
    expect(await bookCount(ctx)).toBe(0);
  });

  it("should roll back rows and files when storing fails part way", async () => {
    let rowsBeforeFailure = { books: 0, chapters: 0 };
    const failing: TestContext = {
      ...ctx,
      storage: {
        ...ctx.storage,
        storeStylesheet: () => {
          rowsBeforeFailure = {
            books: ctx.db.select({ value: count() }).from(books).get()?.value ?? 0,
            chapters: ctx.db.select({ value: count() }).from(chapters).get()?.value ?? 0,
          };
          throw new Error("disk full");
        },
      },
    };

    const epub = await buildEpub({
      chapters: sampleChapters(),
      resources: [{ id: "css", href: "styles/book.css", mediaType: "text/css", data: "p { margin: 0 }" }],
    });

    await expect(importBook(failing, upload(epub))).rejects.toThrow("disk full");
    expect(rowsBeforeFailure).toEqual({ books: 1, chapters: 3 });
    expect(await bookCount(ctx)).toBe(0);
    expect((await ctx.db.select({ value: count() }).from(chapters).get())?.value).toBe(0);

    const epubDir = join(ctx.storage.root, "epubs");
    expect(existsSync(epubDir) ? readdirSync(epubDir) : []).toEqual([]);
  });
});
