import { Layout } from "../components/Layout";
import type { ChapterView } from "../lib/reader";
import { CONTENT_SCOPE } from "../lib/processing/stylesheet";
import { mediaUrl } from "../lib/storage";
import { renderDocument } from "./render";

const CONTENT_CLASS = CONTENT_SCOPE.slice(1);

export function renderChapterPage({ book, chapter, previous, next, chapters, restorePosition }: ChapterView): string {
  const chapterUrl = `/book/${book.id}/chapter/${chapter.id}/`;

  return renderDocument(
    <Layout
      title={`${chapter.title} · ${book.title}`}
      stylesheets={book.stylesheetPath ? [mediaUrl(book.stylesheetPath)] : []}
      scripts={["/static/reader.js"]}
    >
      <div className="reader">
        <aside className="reader-toc">
          <h2>{book.title}</h2>
          <ol>
            {chapters.map((item) => (
              <li key={item.id} className={item.id === chapter.id ? "current" : undefined}>
                <a href={`/book/${book.id}/chapter/${item.id}/`}>{item.title}</a>
              </li>
            ))}
          </ol>
        </aside>

        <article
          className="reader-main"
          data-progress-url={`/book/${book.id}/progress/`}
          data-chapter-id={chapter.id}
          data-restore-position={restorePosition}
        >
          <p className="muted">
            {book.title}
            {book.author ? ` · ${book.author}` : ""}
          </p>
          <div className={CONTENT_CLASS} dangerouslySetInnerHTML={{ __html: chapter.content }} />

          <nav className="reader-nav">
            {previous ? (
              <a href={`${chapterUrl}prev/`} className="button" rel="prev">
                ← {previous.title}
              </a>
            ) : (
              <span />
            )}
            {next ? (
              <a href={`${chapterUrl}next/`} className="button" rel="next">
                {next.title} →
              </a>
            ) : (
              <span />
            )}
          </nav>
        </article>
      </div>
    </Layout>,
  );
}
