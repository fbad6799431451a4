import type { AppConfig } from "./config";
import type { Db } from "./db";
import type { BlobStorage } from "./storage";
import type { DocumentRenderer } from "./export/renderer";

/** Everything a workflow needs, built once at startup and handed to the routes */
export interface AppContext {
  config: AppConfig;
  db: Db;
  storage: BlobStorage;
  renderer: DocumentRenderer;
}
