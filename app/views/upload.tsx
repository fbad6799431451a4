import { Layout } from "../components/Layout";
import { renderDocument } from "./render";

interface UploadPageProps {
  maxUploadBytes: number;
  error?: string;
}

export function renderUploadPage({ maxUploadBytes, error }: UploadPageProps): string {
  const limitMb = Math.round(maxUploadBytes / (1024 * 1024));
  return renderDocument(
    <Layout title="Upload">
      <div className="page-header">
        <h1>Upload an EPUB</h1>
      </div>

      {error && (
        <p className="alert alert-error" role="alert">
          {error}
        </p>
      )}

      <form method="post" action="/upload/" encType="multipart/form-data" className="card form">
        <label htmlFor="file">EPUB file</label>
        <input id="file" name="file" type="file" accept=".epub,application/epub+zip" required />
        <p className="muted">Maximum size {limitMb}MB.</p>
        <button type="submit" className="button button-primary">
          Upload
        </button>
      </form>
    </Layout>,
  );
}
