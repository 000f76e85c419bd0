import { createClickHouseClient } from "@sightline/db/clickhouse";
import { createDb } from "@sightline/db/client";
import { loadConfig } from "./config.js";
import { createApp } from "./index.js";

async function main() {
  const config = loadConfig();

  const db = createDb(config.databaseUrl, { maxConnections: config.databasePoolMax });
  const clickhouse = createClickHouseClient(config.clickhouseUrl, {
    requestTimeoutMs: config.clickhouseRequestTimeoutMs,
  });

  const app = await createApp({ db, clickhouse, logLevel: config.logLevel });

  app.addHook("onClose", async () => {
    await Promise.all([db.$client.end(), clickhouse.close()]);
  });

  try {
    await app.listen({ port: config.port, host: "0.0.0.0" });
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
