import { buildApp } from "./app.js";
import { buildStore } from "./build_store.js";
import { loadConfig } from "./config.js";
import { loadIndexPage } from "./index_page.js";

const config = loadConfig();
const store = buildStore(config);
await store.init();

const indexPage = loadIndexPage(config.indexHtmlPath, config.baseUrl);
const app = await buildApp({ config, store, indexHtml: indexPage.html });

const shutdown = async (signal: string) => {
  app.log.info({ signal }, "shutting down");
  try {
    await app.close();
    await store.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "shutdown failed");
    process.exit(1);
  }
};

process.once("SIGTERM", (signal) => void shutdown(signal));
process.once("SIGINT", (signal) => void shutdown(signal));

await app.listen({ port: config.port, host: config.host });
app.log.info(
  {
    port: config.port,
    baseUrl: config.baseUrl,
    storageMode: config.storageMode,
    indexFromFile: indexPage.fromFile,
    version: config.version
  },
  "url-service started"
);
