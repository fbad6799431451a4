import { Layout } from "../components/Layout";
import type { Book } from "../lib/db/schema";
import { EXPORT_QUALITIES, PAGE_FORMATS, describeFormat, describeQuality } from "../lib/export/settings";
import { renderDocument } from "./render";

export function renderExportPage({ book, chapterCount }: { book: Book; chapterCount: number }): string {
  return renderDocument(
    <Layout title={`Export ${book.title}`}>
      <div className="page-header">
        <h1>Export to PDF</h1>
        <p className="muted">
          {book.title} · {chapterCount} {chapterCount === 1 ? "chapter" : "chapters"}
        </p>
      </div>

      <form method="get" action={`/book/${book.id}/pdf/generate/`} className="card form">
        <fieldset>
          <legend>Page format</legend>
          {PAGE_FORMATS.map((format) => (
            <label key={format} className="choice">
              <input type="radio" name="format" value={format} defaultChecked={format === "standard"} />
              {describeFormat(format)}
            </label>
          ))}
        </fieldset>

        <fieldset>
          <legend>Image quality</legend>
          {EXPORT_QUALITIES.map((quality) => (
            <label key={quality} className="choice">
              <input type="radio" name="quality" value={quality} defaultChecked={quality === "standard"} />
              {describeQuality(quality)}
            </label>
          ))}
        </fieldset>

        <button type="submit" className="button button-primary">
          Download PDF
        </button>
      </form>
    </Layout>,
  );
}
