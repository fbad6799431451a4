import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PDFDocument } from "pdf-lib";

import { exportBook, exportFileName } from "../app/lib/export";
import { PAGE_BREAK_CLASS, assembleDocument, stripRepeatedTitle } from "../app/lib/export/document";
import { PdfLibRenderer, type DocumentRenderer, type RenderRequest } from "../app/lib/export/renderer";
import { resolveRenderSettings } from "../app/lib/export/settings";
import { importBook } from "../app/lib/processing";
import { NotFoundError, RenderFailedError } from "../app/lib/errors";
import { buildEpub, sampleChapters, solidPng } from "./helpers/epub";
import { createTestContext, seedBook, type TestContext } from "./helpers/context";

const BOOK = { title: "Sample Book", author: "Ann Author", uploadedAt: new Date("2024-01-15T10:00:00Z") };
const CHAPTERS = [
  { title: "One", content: "<h1>One</h1><p>First</p>" },
  { title: "Two", content: "<p>Second</p>" },
];

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("assembleDocument", () => {
  it("should lay out the title page, contents and chapters in order", () => {
    const html = assembleDocument(BOOK, CHAPTERS);

    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html).toContain('<h1 class="book-title">Sample Book</h1>');
    expect(html).toContain('<p class="book-author">by Ann Author</p>');
    expect(html).toContain('<p class="book-date">Uploaded on January 15, 2024</p>');
    expect(html).toContain("<ol><li>One</li><li>Two</li></ol>");
    expect(html.indexOf('<h2 class="chapter-title">One</h2>')).toBeLessThan(
      html.indexOf('<h2 class="chapter-title">Two</h2>'),
    );
  });

  it("should start the contents and every chapter on a new page", () => {
    const html = assembleDocument(BOOK, CHAPTERS);

    expect(countOccurrences(html, `<div class="${PAGE_BREAK_CLASS}"></div>`)).toBe(3);
  });

  it("should not repeat a chapter heading that matches its title", () => {
    const html = assembleDocument(BOOK, CHAPTERS);

    expect(html).toContain('<div class="chapter-body"><p>First</p></div>');
    expect(html).toContain('<div class="chapter-body"><p>Second</p></div>');
  });

  it("should name unknown authors and include the cover when given", () => {
    const html = assembleDocument({ ...BOOK, author: null }, CHAPTERS, { coverUrl: "/media/covers/b.jpg" });

    expect(html).toContain('<p class="book-author">by Unknown Author</p>');
    expect(html).toContain('<img class="cover" src="/media/covers/b.jpg" alt=""/>');
    expect(html).not.toContain('name="author"');
  });

  it("should be deterministic", () => {
    expect(assembleDocument(BOOK, CHAPTERS)).toBe(assembleDocument(BOOK, CHAPTERS));
  });
});

describe("stripRepeatedTitle", () => {
  it("should drop a leading heading equal to the title", () => {
    expect(stripRepeatedTitle("<h2> the  END </h2><p>x</p>", "The End")).toBe("<p>x</p>");
  });

  it("should keep content that does not start with the title", () => {
    expect(stripRepeatedTitle("<p>The End</p>", "The End")).toBe("<p>The End</p>");
    expect(stripRepeatedTitle("<h1>Prologue</h1>", "The End")).toBe("<h1>Prologue</h1>");
  });
});

describe("resolveRenderSettings", () => {
  it("should combine the page format with the quality preset", () => {
    expect(resolveRenderSettings("mobile", "print")).toEqual({
      pageSize: [324, 504],
      baseFontSize: 14,
      imageDpi: 300,
      jpegQuality: 95,
      compress: false,
      margins: { top: 54, right: 54, bottom: 72, left: 54 },
    });
    expect(resolveRenderSettings("standard", "high").pageSize).toEqual([595.28, 841.89]);
    expect(resolveRenderSettings("standard", "high").imageDpi).toBe(150);
  });
});

describe("exportFileName", () => {
  it("should replace characters outside word characters, dash and dot", () => {
    expect(exportFileName("My Book: Vol. 1", { format: "mobile", quality: "high" })).toBe(
      "My_Book__Vol._1_mobile_high.pdf",
    );
  });
});

describe("PdfLibRenderer", () => {
  const renderer = new PdfLibRenderer();
  const settings = resolveRenderSettings("standard", "standard");

  async function pageCount(bytes: Uint8Array): Promise<number> {
    return (await PDFDocument.load(bytes)).getPageCount();
  }

  it("should ignore page breaks on a blank page", async () => {
    const breakEl = `<div class="${PAGE_BREAK_CLASS}"></div>`;
    const html = `<html><body>${breakEl}<p>a</p>${breakEl}${breakEl}<p>b</p></body></html>`;

    expect(await pageCount(await renderer.render({ html, settings }))).toBe(2);
  });

  it("should flow long text onto further pages", async () => {
    const paragraph = `<p>${"Lorem ipsum dolor sit amet. ".repeat(20)}</p>`;
    const html = `<html><body>${paragraph.repeat(40)}</body></html>`;

    expect(await pageCount(await renderer.render({ html, settings }))).toBeGreaterThan(1);
  });

  it("should render characters the standard font lacks", async () => {
    const bytes = await renderer.render({ html: "<p>Snow ☃ and 漢字</p>", settings });

    expect(await pageCount(bytes)).toBe(1);
  });

  it("should embed images it can load and skip those it cannot", async () => {
    const png = await solidPng(40, 60);
    const html = '<p>Cover</p><img class="cover" src="/media/a.png"><img src="/media/broken.png">';

    const bytes = await renderer.render({
      html,
      settings: resolveRenderSettings("standard", "print"),
      loadImage: async (src) => (src === "/media/a.png" ? png : Buffer.from("not an image")),
    });

    expect(Buffer.from(bytes).toString("latin1")).toContain("/Subtype /Image");
  });
});

describe("exportBook", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it("should produce a PDF with a page each for the title, contents and chapters", async () => {
    const { bookId } = await importBook(ctx, {
      fileName: "sample.epub",
      contentType: "application/epub+zip",
      data: await buildEpub({ chapters: sampleChapters() }),
    });

    const result = await exportBook(ctx, bookId, { format: "standard", quality: "standard" });
    const pdf = await PDFDocument.load(result.data);

    expect(result.fileName).toBe("Sample_Book_standard_standard.pdf");
    expect(pdf.getPageCount()).toBe(5);
    expect(pdf.getPage(0).getWidth()).toBeCloseTo(595.28);
    expect(pdf.getPage(0).getHeight()).toBeCloseTo(841.89);
    expect(pdf.getTitle()).toBe("Sample Book");
    expect(pdf.getAuthor()).toBe("Ann Author");
  });

  it("should use the mobile page size", async () => {
    const book = await seedBook(ctx.db, { chapterTitles: ["Only"] });

    const result = await exportBook(ctx, book.id, { format: "mobile", quality: "high" });
    const pdf = await PDFDocument.load(result.data);

    expect(pdf.getPage(0).getWidth()).toBeCloseTo(324);
    expect(pdf.getPage(0).getHeight()).toBeCloseTo(504);
  });

  it("should hand the renderer the assembled document and a loader for stored media", async () => {
    const { bookId } = await importBook(ctx, {
      fileName: "sample.epub",
      contentType: "application/epub+zip",
      data: await buildEpub({
        chapters: sampleChapters(),
        resources: [
          {
            id: "cover",
            href: "images/cover.png",
            mediaType: "image/png",
            data: await solidPng(40, 60),
            properties: "cover-image",
          },
        ],
      }),
    });

    const requests: RenderRequest[] = [];
    const renderer: DocumentRenderer = {
      async render(request) {
        requests.push(request);
        return new Uint8Array([0x25, 0x50, 0x44, 0x46]);
      },
    };

    const result = await exportBook({ ...ctx, renderer }, bookId, { format: "standard", quality: "print" });

    expect(result.data).toEqual(new Uint8Array([0x25, 0x50, 0x44, 0x46]));
    expect(requests).toHaveLength(1);
    expect(requests[0].settings).toEqual(resolveRenderSettings("standard", "print"));
    expect(requests[0].html).toContain(`<img class="cover" src="/media/covers/${bookId}.jpg" alt=""/>`);

    const cover = await requests[0].loadImage?.(`/media/covers/${bookId}.jpg`);
    expect(cover?.subarray(0, 3)).toEqual(Buffer.from([0xff, 0xd8, 0xff]));
    expect(await requests[0].loadImage?.("https://example.com/x.png")).toBeNull();
  });

  it("should report renderer failures as RenderFailed", async () => {
    const book = await seedBook(ctx.db);
    const renderer: DocumentRenderer = {
      async render() {
        throw new Error("boom");
      },
    };

    const pending = exportBook({ ...ctx, renderer }, book.id, { format: "standard", quality: "standard" });

    await expect(pending).rejects.toBeInstanceOf(RenderFailedError);
    await expect(pending).rejects.toThrow("Could not generate the PDF: boom");
    await expect(pending).rejects.toMatchObject({ status: 502 });
  });

  it("should treat empty output as a failure", async () => {
    const book = await seedBook(ctx.db);
    const renderer: DocumentRenderer = { render: async () => new Uint8Array() };

    await expect(
      exportBook({ ...ctx, renderer }, book.id, { format: "standard", quality: "standard" }),
    ).rejects.toBeInstanceOf(RenderFailedError);
  });

  it("should refuse books without chapters and unknown books", async () => {
    const empty = await seedBook(ctx.db, { chapterTitles: [] });

    await expect(exportBook(ctx, empty.id, { format: "standard", quality: "standard" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(exportBook(ctx, "missing", { format: "standard", quality: "standard" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
