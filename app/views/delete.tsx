import { Layout } from "../components/Layout";
import type { Book } from "../lib/db/schema";
import { renderDocument } from "./render";

export function renderDeletePage({ book }: { book: Book }): string {
  return renderDocument(
    <Layout title={`Delete ${book.title}`}>
      <div className="card">
        <h1>Delete “{book.title}”?</h1>
        <p>The book, its chapters and reading progress will be removed permanently.</p>
        <form method="post" action={`/book/${book.id}/delete/`} className="actions">
          <button type="submit" className="button button-danger">
            Delete
          </button>
          <a href="/" className="button">
            Cancel
          </a>
        </form>
      </div>
    </Layout>,
  );
}
