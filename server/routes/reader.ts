import { Hono } from "hono";
import { z } from "zod";
import {
  deleteBook,
  formatProgressReport,
  getAdjacentChapter,
  getChapterView,
  getProgressReport,
  requireBook,
  resolveLandingChapter,
  updateProgress,
  type Direction,
} from "../../app/lib/reader";
import { AppError, ValidationError, errorMessage } from "../../app/lib/errors";
import type { Db } from "../../app/lib/db";
import { renderBookPage } from "../../app/views/book";
import { renderChapterPage } from "../../app/views/chapter";
import { renderDeletePage } from "../../app/views/delete";
import type { AppEnv } from "../env";

const MAX_POSITION_LENGTH = 64;

const progressSchema = z.object({
  position: z
    .union([z.string(), z.number().finite()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1).max(MAX_POSITION_LENGTH)),
  chapterId: z
    .string()
    .optional()
    .transform((value) => value || undefined),
});

const app = new Hono<AppEnv>();

// GET /book/:id/ - resume where the reader left off
app.get("/book/:id/", async (c) => {
  const { db } = c.get("ctx");
  const bookId = c.req.param("id");

  const landing = await resolveLandingChapter(db, bookId);
  if (!landing) {
    return c.html(renderBookPage({ book: await requireBook(db, bookId) }));
  }
  return c.redirect(`/book/${bookId}/chapter/${landing.id}/`, 302);
});

// GET /book/:id/chapter/:chapterId/ - one chapter
app.get("/book/:id/chapter/:chapterId/", async (c) => {
  const view = await getChapterView(c.get("ctx").db, c.req.param("id"), c.req.param("chapterId"));
  return c.html(renderChapterPage(view));
});

async function adjacentUrl(db: Db, bookId: string, chapterId: string, direction: Direction): Promise<string> {
  const target = await getAdjacentChapter(db, bookId, chapterId, direction);
  return `/book/${bookId}/chapter/${target.id}/`;
}

// GET /book/:id/chapter/:chapterId/next/ and .../prev/ - stay put at either end
app.get("/book/:id/chapter/:chapterId/next/", async (c) => {
  return c.redirect(await adjacentUrl(c.get("ctx").db, c.req.param("id"), c.req.param("chapterId"), "next"), 302);
});

app.get("/book/:id/chapter/:chapterId/prev/", async (c) => {
  return c.redirect(await adjacentUrl(c.get("ctx").db, c.req.param("id"), c.req.param("chapterId"), "previous"), 302);
});

// POST /book/:id/progress/ - JSON or form { position, chapterId? }
app.post("/book/:id/progress/", async (c) => {
  try {
    const contentType = c.req.header("content-type") ?? "";
    const raw: unknown = contentType.includes("application/json") ? await c.req.json() : await c.req.parseBody();

    const parsed = progressSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid progress update: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join(", ")}`,
      );
    }

    await updateProgress(c.get("ctx").db, c.req.param("id"), parsed.data);
    return c.json({ status: "success" });
  } catch (error) {
    if (error instanceof AppError) {
      return c.json({ status: "error", message: error.message }, error.status);
    }
    if (error instanceof SyntaxError) {
      return c.json({ status: "error", message: "Request body is not valid JSON" }, 400);
    }
    console.error("[Server] Saving progress failed:", error);
    return c.json({ status: "error", message: errorMessage(error) }, 500);
  }
});

// GET /book/:id/delete/ - confirmation page
app.get("/book/:id/delete/", async (c) => {
  const book = await requireBook(c.get("ctx").db, c.req.param("id"));
  return c.html(renderDeletePage({ book }));
});

// POST /book/:id/delete/ - delete the book and its files
app.post("/book/:id/delete/", async (c) => {
  await deleteBook(c.get("ctx"), c.req.param("id"));
  return c.redirect("/", 303);
});

// GET /debug/progress/ - plain-text dump of every book's progress
app.get("/debug/progress/", async (c) => {
  return c.text(formatProgressReport(await getProgressReport(c.get("ctx").db)));
});

export { app as readerRoutes };
