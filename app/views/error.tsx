import { Layout } from "../components/Layout";
import { renderDocument } from "./render";

interface ErrorPageProps {
  status: number;
  title: string;
  message: string;
}

export function renderErrorPage({ status, title, message }: ErrorPageProps): string {
  return renderDocument(
    <Layout title={title}>
      <div className="card error-page">
        <p className="error-status">{status}</p>
        <h1>{title}</h1>
        <p>{message}</p>
        <a href="/" className="button">
          Back to library
        </a>
      </div>
    </Layout>,
  );
}
