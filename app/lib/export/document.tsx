import { renderToStaticMarkup } from "react-dom/server";
import { JSDOM } from "jsdom";
import { collapseWhitespace } from "../processing/utils";

export const PAGE_BREAK_CLASS = "page-break";

export interface DocumentBook {
  title: string;
  author: string | null;
  uploadedAt: Date;
}

export interface DocumentChapter {
  title: string;
  content: string;
}

export interface AssembleOptions {
  coverUrl?: string | null;
}

const HEADING = /^h[1-6]$/i;

/**
 * Drop a leading heading that repeats the chapter title, so the title is not
 * printed twice.
 */
export function stripRepeatedTitle(content: string, title: string): string {
  const dom = new JSDOM(`<body>${content}</body>`);
  try {
    const body = dom.window.document.body;
    const first = body.firstElementChild;
    if (
      first &&
      HEADING.test(first.tagName) &&
      collapseWhitespace(first.textContent ?? "").toLowerCase() === collapseWhitespace(title).toLowerCase()
    ) {
      first.remove();
      return body.innerHTML.trim();
    }
    return content;
  } finally {
    dom.window.close();
  }
}

function formatUploadDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });
}

function PageBreak() {
  return <div className={PAGE_BREAK_CLASS} />;
}

function ExportDocument({
  book,
  chapters,
  coverUrl,
}: {
  book: DocumentBook;
  chapters: DocumentChapter[];
  coverUrl?: string | null;
}) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{book.title}</title>
        {book.author ? <meta name="author" content={book.author} /> : null}
      </head>
      <body>
        <section className="title-page">
          <h1 className="book-title">{book.title}</h1>
          <p className="book-author">by {book.author || "Unknown Author"}</p>
          <p className="book-date">Uploaded on {formatUploadDate(book.uploadedAt)}</p>
          {coverUrl ? <img className="cover" src={coverUrl} alt="" /> : null}
        </section>
        <PageBreak />
        <section className="toc">
          <h1>Table of Contents</h1>
          <ol>
            {chapters.map((chapter, i) => (
              <li key={i}>{chapter.title}</li>
            ))}
          </ol>
        </section>
        {chapters.map((chapter, i) => (
          <section key={i} className="chapter">
            <PageBreak />
            <h2 className="chapter-title">{chapter.title}</h2>
            <div
              className="chapter-body"
              dangerouslySetInnerHTML={{ __html: stripRepeatedTitle(chapter.content, chapter.title) }}
            />
          </section>
        ))}
      </body>
    </html>
  );
}

/**
 * Build the single document handed to the renderer: title page, table of
 * contents, then every chapter in order, each starting on a new page.
 */
export function assembleDocument(
  book: DocumentBook,
  chapters: DocumentChapter[],
  options: AssembleOptions = {},
): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(
    <ExportDocument book={book} chapters={chapters} coverUrl={options.coverUrl} />,
  )}`;
}
