import { getBookWithChapters } from "../reader";
import { mediaUrl } from "../storage";
import { NotFoundError, RenderFailedError, errorMessage } from "../errors";
import { assembleDocument } from "./document";
import { resolveRenderSettings } from "./settings";
import type { AppContext } from "../context";
import type { ExportOptions, ExportResult } from "../types";

const MEDIA_PREFIX = "/media/";

/** Download name: the title with anything outside [A-Za-z0-9_.-] replaced */
export function exportFileName(title: string, { format, quality }: ExportOptions): string {
  return `${title.replace(/[^\w\-.]/g, "_")}_${format}_${quality}.pdf`;
}

/**
 * Render a whole book (title page, contents, every chapter) to PDF with the
 * given page format and image quality.
 */
export async function exportBook(
  ctx: Pick<AppContext, "db" | "storage" | "renderer">,
  bookId: string,
  options: ExportOptions,
): Promise<ExportResult> {
  const startTime = Date.now();
  const { book, chapters } = await getBookWithChapters(ctx.db, bookId);
  if (chapters.length === 0) {
    throw new NotFoundError(`"${book.title}" has no chapters to export`);
  }

  const html = assembleDocument(book, chapters, {
    coverUrl: book.coverPath ? mediaUrl(book.coverPath) : null,
  });
  const settings = resolveRenderSettings(options.format, options.quality);

  let data: Uint8Array;
  try {
    data = await ctx.renderer.render({
      html,
      settings,
      loadImage: async (src) =>
        src.startsWith(MEDIA_PREFIX) ? ctx.storage.readStoredFile(src.slice(MEDIA_PREFIX.length)) : null,
    });
  } catch (error) {
    console.error(`[Export] Rendering "${book.title}" failed:`, error);
    throw new RenderFailedError(`Could not generate the PDF: ${errorMessage(error)}`, { cause: error });
  }

  if (data.length === 0) {
    throw new RenderFailedError("Could not generate the PDF: the renderer produced no output");
  }

  console.log(
    `[Export] "${book.title}" (${options.format}/${options.quality}): ${data.length} bytes in ${Date.now() - startTime}ms`,
  );

  return { fileName: exportFileName(book.title, options), data };
}
