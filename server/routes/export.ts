import { Hono } from "hono";
import { z } from "zod";
import { exportBook } from "../../app/lib/export";
import { EXPORT_QUALITIES, PAGE_FORMATS } from "../../app/lib/export/settings";
import { getBookWithChapters } from "../../app/lib/reader";
import { ValidationError } from "../../app/lib/errors";
import { renderExportPage } from "../../app/views/export";
import type { AppEnv } from "../env";

const exportQuerySchema = z.object({
  format: z.enum(PAGE_FORMATS).default("standard"),
  quality: z.enum(EXPORT_QUALITIES).default("standard"),
});

const app = new Hono<AppEnv>();

// GET /book/:id/pdf/ - choose format and quality
app.get("/book/:id/pdf/", async (c) => {
  const { book, chapters } = await getBookWithChapters(c.get("ctx").db, c.req.param("id"));
  return c.html(renderExportPage({ book, chapterCount: chapters.length }));
});

// GET /book/:id/pdf/generate/?format=standard|mobile&quality=standard|high|print
app.get("/book/:id/pdf/generate/", async (c) => {
  const parsed = exportQuerySchema.safeParse(c.req.query());
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid export options: ${parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join(", ")}`,
    );
  }

  const result = await exportBook(c.get("ctx"), c.req.param("id"), parsed.data);

  return new Response(new Uint8Array(result.data), {
    headers: {
      "Content-Type": "application/pdf",
      "Content-Disposition": `attachment; filename="${result.fileName}"`,
      "Content-Length": String(result.data.length),
    },
  });
});

export { app as exportRoutes };
