import { Layout } from "../components/Layout";
import { BookCard } from "../components/BookCard";
import type { BookSummary } from "../lib/reader";
import { renderDocument } from "./render";

export function renderLibraryPage({ books }: { books: BookSummary[] }): string {
  return renderDocument(
    <Layout title="Library" wide>
      <div className="page-header">
        <h1>Library</h1>
        <p className="muted">
          {books.length} {books.length === 1 ? "book" : "books"}
        </p>
      </div>

      {books.length === 0 ? (
        <div className="empty-state">
          <p>Your library is empty.</p>
          <a href="/upload/" className="button button-primary">
            Upload an EPUB
          </a>
        </div>
      ) : (
        <div className="book-grid">
          {books.map(({ book, chapterCount }) => (
            <BookCard key={book.id} book={book} chapterCount={chapterCount} />
          ))}
        </div>
      )}
    </Layout>,
  );
}
