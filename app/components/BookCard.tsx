import type { Book } from "../lib/db/schema";
import { mediaUrl } from "../lib/storage";

interface BookCardProps {
  book: Book;
  chapterCount: number;
}

export function BookCard({ book, chapterCount }: BookCardProps) {
  return (
    <article className="book-card">
      <a
        href={`/book/${book.id}/`}
        className="book-cover"
        style={{ backgroundColor: book.coverColor || undefined }}
      >
        {book.coverPath ? (
          <img src={mediaUrl(book.coverPath)} alt={book.title} />
        ) : (
          <span className="book-cover-placeholder">{book.title}</span>
        )}
      </a>

      <div className="book-info">
        <h3 className="book-title">
          <a href={`/book/${book.id}/`}>{book.title}</a>
        </h3>
        {book.author && <p className="book-author">{book.author}</p>}
        <p className="book-meta">
          {chapterCount} {chapterCount === 1 ? "chapter" : "chapters"}
          {book.lastChapterId ? " · in progress" : ""}
        </p>
        <div className="book-actions">
          <a href={`/book/${book.id}/`} className="button button-primary">
            {book.lastChapterId ? "Continue" : "Read"}
          </a>
          <a href={`/book/${book.id}/pdf/`} className="button">
            PDF
          </a>
          <a href={`/book/${book.id}/delete/`} className="button button-danger">
            Delete
          </a>
        </div>
      </div>
    </article>
  );
}
