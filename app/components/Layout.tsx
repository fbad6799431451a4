import type { ReactNode } from "react";

interface LayoutProps {
  title: string;
  children: ReactNode;
  /** Extra stylesheets, e.g. a book's scoped CSS */
  stylesheets?: string[];
  scripts?: string[];
  wide?: boolean;
}

export function Layout({ title, children, stylesheets = [], scripts = [], wide = false }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · Bindery`}</title>
        <link rel="stylesheet" href="/static/app.css" />
        {stylesheets.map((href) => (
          <link key={href} rel="stylesheet" href={href} />
        ))}
      </head>
      <body>
        <header className="site-header">
          <nav className="container nav">
            <a href="/" className="brand">
              Bindery
            </a>
            <div className="nav-links">
              <a href="/">Library</a>
              <a href="/upload/" className="button button-primary">
                Upload
              </a>
            </div>
          </nav>
        </header>
        <main className={wide ? "container container-wide" : "container"}>{children}</main>
        <footer className="site-footer">
          <div className="container">Bindery · EPUB reader</div>
        </footer>
        {scripts.map((src) => (
          <script key={src} src={src} defer />
        ))}
      </body>
    </html>
  );
}
