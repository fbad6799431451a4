import { Layout } from "../components/Layout";
import type { Book } from "../lib/db/schema";
import { renderDocument } from "./render";

/** Shown for a book without any chapters to open */
export function renderBookPage({ book }: { book: Book }): string {
  return renderDocument(
    <Layout title={book.title}>
      <div className="page-header">
        <h1>{book.title}</h1>
        {book.author && <p className="muted">by {book.author}</p>}
      </div>
      <div className="empty-state">
        <p>This book has no chapters to read.</p>
        <a href={`/book/${book.id}/delete/`} className="button button-danger">
          Delete book
        </a>
      </div>
    </Layout>,
  );
}
