import { serve } from "@hono/node-server";

import { loadConfig } from "../app/lib/config";
import { createDb } from "../app/lib/db";
import { createStorage } from "../app/lib/storage";
import { PdfLibRenderer } from "../app/lib/export/renderer";
import { createApp } from "./app";

const config = loadConfig();
const app = createApp({
  config,
  db: createDb(config.databasePath),
  storage: createStorage(config.mediaRoot),
  renderer: new PdfLibRenderer(),
});

console.log(`[Server] Starting on port ${config.port} (database ${config.databasePath}, media ${config.mediaRoot})`);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[Server] Listening on http://localhost:${info.port}`);
});
