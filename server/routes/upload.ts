import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { importBook } from "../../app/lib/processing";
import { AppError, FileTooLargeError, ValidationError } from "../../app/lib/errors";
import { renderUploadPage } from "../../app/views/upload";
import type { AppEnv } from "../env";

// Room for the multipart boundaries and headers around the file itself
const MULTIPART_OVERHEAD = 1024 * 1024;

const app = new Hono<AppEnv>();

// GET /upload/ - upload form
app.get("/upload/", (c) => {
  return c.html(renderUploadPage({ maxUploadBytes: c.get("ctx").config.maxUploadBytes }));
});

// POST /upload/ - import an EPUB from the multipart field "file"
app.post(
  "/upload/",
  (c, next) => {
    const { maxUploadBytes } = c.get("ctx").config;
    return bodyLimit({
      maxSize: maxUploadBytes + MULTIPART_OVERHEAD,
      onError: (c) =>
        c.html(renderUploadPage({ maxUploadBytes, error: new FileTooLargeError(maxUploadBytes).message }), 413),
    })(c, next);
  },
  async (c) => {
    const ctx = c.get("ctx");
    const { maxUploadBytes } = ctx.config;

    try {
      const body = await c.req.parseBody();
      const file = body["file"];
      if (!(file instanceof File) || file.size === 0) {
        throw new ValidationError("Please choose an EPUB file to upload.");
      }

      await importBook(ctx, {
        fileName: file.name,
        contentType: file.type,
        data: Buffer.from(await file.arrayBuffer()),
      });

      return c.redirect("/", 303);
    } catch (error) {
      if (error instanceof AppError) {
        console.warn(`[Import] Upload rejected: ${error.message}`);
        return c.html(renderUploadPage({ maxUploadBytes, error: error.message }), error.status);
      }
      throw error;
    }
  },
);

export { app as uploadRoutes };
