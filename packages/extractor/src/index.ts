import { createAdsClient } from "./api/adsClient";
import { createCredentialStore, credentialsFromConfig } from "./api/credentialStore";
import { createTokenManager } from "./api/tokenManager";
import { buildCatalog, selectStreams } from "./catalog/catalog";
import { readCatalogSelection } from "./catalog/catalogFile";
import { loadSchemas } from "./catalog/schemas";
import { loadConfig } from "./config";
import { createPostgresStateStore } from "./db/bookmarkStore";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import { createLogger } from "./logger";
import { createMessageWriter } from "./output/messageWriter";
import { createFileStateStore } from "./state/fileStateStore";
import type { StateStore } from "./state/stateStore";
import { runSync } from "./sync/orchestrator";
import type { ExtractorConfig } from "./types";

const logger = createLogger(process.env.LOG_LEVEL ?? "info");

async function openStateStore(config: ExtractorConfig): Promise<StateStore | undefined> {
  if (config.databaseUrl) {
    const pool = createPool(config.databaseUrl);

    try {
      const applied = await runMigrations(pool);
      logger.info(`bookmark store ready (backend=postgres, migrationsApplied=${applied})`);
    } catch (error) {
      await pool.end();
      throw error;
    }

    return createPostgresStateStore(pool);
  }

  if (config.statePath) {
    logger.info(`bookmark store ready (backend=file, path=${config.statePath})`);
    return createFileStateStore(config.statePath);
  }

  logger.info("no bookmark store configured; state is only emitted on stdout");
  return undefined;
}

async function resolveSelection(config: ExtractorConfig): Promise<string[] | null> {
  if (config.catalogPath) {
    const selected = await readCatalogSelection(config.catalogPath);
    logger.info(
      `catalog loaded (path=${config.catalogPath}, selected=${selected.join(",") || "none"})`
    );
    return selected;
  }

  return config.selectedStreams;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const catalog = selectStreams(
    buildCatalog(await loadSchemas()),
    await resolveSelection(config)
  );
  const stateStore = await openStateStore(config);

  try {
    const state = stateStore ? await stateStore.load() : { bookmarks: {} };
    const credentials = createCredentialStore(credentialsFromConfig(config));
    const tokenManager = createTokenManager(credentials, {
      authUrl: config.authUrl,
      userAgent: config.userAgent
    });
    const client = createAdsClient(config, credentials, tokenManager, { logger });

    logger.info(
      `sync starting (account=${config.accountId}, streams=${catalog.map((stream) => stream.streamId).join(",")}, conversionWindow=${config.conversionWindowDays})`
    );

    const result = await runSync(
      catalog,
      state,
      {
        startsAt: config.startsAt,
        conversionWindowDays: config.conversionWindowDays,
        progressLogIntervalMs: config.progressLogIntervalMs
      },
      {
        client,
        writer: createMessageWriter(),
        stateStore,
        logger
      }
    );

    const totalRecords = result.streams.reduce(
      (total, stream) => total + stream.recordCount,
      0
    );
    logger.info(`sync complete (streams=${result.streams.length}, records=${totalRecords})`);
  } finally {
    await stateStore?.close?.();
  }
}

main().catch((error: unknown) => {
  logger.error("sync failed", error);
  process.exit(1);
});
