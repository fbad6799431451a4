import { Hono } from "hono";
import { listBooks } from "../../app/lib/reader";
import { renderLibraryPage } from "../../app/views/library";
import type { AppEnv } from "../env";

const app = new Hono<AppEnv>();

// GET / - every book, newest upload first
app.get("/", async (c) => {
  const books = await listBooks(c.get("ctx").db);
  return c.html(renderLibraryPage({ books }));
});

export { app as libraryRoutes };
