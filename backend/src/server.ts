import 'dotenv/config';
import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import {
  CsvCatalogAccessor,
  MongoCatalogAccessor,
  type CatalogAccessor,
} from './modules/catalog/index.js';
import {
  MemoryReportingSink,
  MongoReportingSink,
  type ReportingSink,
} from './modules/reduction-scan/index.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  F&O Strike Reduction Analytics');
  console.log('═══════════════════════════════════════════════════════════════');

  const env = loadEnv();
  const needsMongo = env.CATALOG_SOURCE === 'mongo' || env.REPORT_SINK === 'mongo';

  if (needsMongo) {
    console.log('[BOOT] Connecting to MongoDB...');
    await connectMongo(env.MONGO_URL);
  }

  const catalog: CatalogAccessor = env.CATALOG_SOURCE === 'csv'
    ? CsvCatalogAccessor.fromFiles(env.CATALOG_CSV_PATHS, env.TIE_BREAK_FIELDS)
    : new MongoCatalogAccessor(env.TIE_BREAK_FIELDS);

  const sink: ReportingSink = env.REPORT_SINK === 'memory'
    ? new MemoryReportingSink()
    : new MongoReportingSink();

  console.log(`[BOOT] Catalog: ${catalog.name}, sink: ${sink.name}`);

  const app = buildApp({
    catalog,
    sink,
    scanOptions: {
      kAbove: env.STRIKES_ABOVE,
      kBelow: env.STRIKES_BELOW,
      thresholdPct: env.REDUCTION_THRESHOLD_PCT,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[BOOT] Received ${signal}, shutting down...`);
    await app.close();
    if (needsMongo) await disconnectMongo();
    console.log('[BOOT] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[BOOT] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[BOOT] ✅ Listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[BOOT] Fatal error:', err);
  process.exit(1);
});
