import { Hono } from "hono";
import { logger } from "hono/logger";

import { AppError } from "../app/lib/errors";
import { renderErrorPage } from "../app/views/error";
import type { AppContext } from "../app/lib/context";
import type { AppEnv } from "./env";

import { libraryRoutes } from "./routes/library";
import { uploadRoutes } from "./routes/upload";
import { readerRoutes } from "./routes/reader";
import { exportRoutes } from "./routes/export";
import { assetsRoutes } from "./routes/assets";

export function createApp(ctx: AppContext) {
  const app = new Hono<AppEnv>();

  if (ctx.config.logRequests) {
    app.use("*", logger());
  }

  app.use("*", async (c, next) => {
    c.set("ctx", ctx);
    await next();
  });

  app.route("/", libraryRoutes);
  app.route("/", uploadRoutes);
  app.route("/", readerRoutes);
  app.route("/", exportRoutes);
  app.route("/", assetsRoutes);

  app.notFound((c) =>
    c.html(
      renderErrorPage({ status: 404, title: "Not found", message: "There is nothing at this address." }),
      404,
    ),
  );

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.html(renderErrorPage({ status: err.status, title: err.title, message: err.message }), err.status);
    }
    console.error(`[Server] ${c.req.method} ${c.req.path} failed:`, err);
    return c.html(
      renderErrorPage({ status: 500, title: "Something went wrong", message: "An unexpected error occurred." }),
      500,
    );
  });

  return app;
}
