import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import { lookup } from "mime-types";
import { NotFoundError } from "../../app/lib/errors";
import type { AppEnv } from "../env";

const MEDIA_PREFIX = "/media/";

const app = new Hono<AppEnv>();

// GET /media/* - stored covers, book images, book stylesheets and EPUBs
app.get("/media/*", async (c) => {
  const relativePath = c.req.path.slice(MEDIA_PREFIX.length);
  const data = await c.get("ctx").storage.readStoredFile(relativePath);
  if (!data) {
    throw new NotFoundError(`No stored file at ${relativePath}`);
  }

  return new Response(new Uint8Array(data), {
    headers: {
      "Content-Type": lookup(relativePath) || "application/octet-stream",
      "Cache-Control": "public, max-age=3600",
    },
  });
});

// GET /static/* - application stylesheet and scripts
app.use(
  "/static/*",
  serveStatic({
    root: "./public",
    rewriteRequestPath: (path) => path.replace(/^\/static/, ""),
  }),
);

export { app as assetsRoutes };
