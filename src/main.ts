import { openMigratedDatabase } from '../lib/local-db/migrator';
import { createConsoleAuditLog } from './server/audit-log';
import { BillIngestor } from './server/billing/bill-ingestor';
import { BillsRepository } from './server/billing/bills-repository';
import { SequenceGenerator } from './server/billing/sequence-generator';
import { CatalogRepository } from './server/catalog/catalog-repository';
import { SyncReconciler } from './server/catalog/sync-reconciler';
import { MonotonicClock } from './server/clock';
import { loadRuntimeEnv, readServerConfig } from './server/config';
import { createApiServer } from './server/http/api-server';
import { createConsoleLogger } from './server/logger';
import { TaxEngine } from './server/tax/tax-engine';
import { loadRateTable } from './server/tax/rate-table';
import { VendorRepository } from './server/vendors/vendor-repository';

const logger = createConsoleLogger('pos-sync');

async function main(): Promise<void> {
  loadRuntimeEnv();
  const config = readServerConfig();

  const db = openMigratedDatabase(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs });
  const rates = loadRateTable(config.ratesDir);
  logger.info('rate table loaded', { dir: config.ratesDir, ...rates.size });

  // One clock for every server stamp so catalog and bill cursors never collide.
  const clock = new MonotonicClock();
  const audit = createConsoleAuditLog();
  const catalog = new CatalogRepository(db);
  const vendors = new VendorRepository(db);
  const sequence = new SequenceGenerator(db, {
    lockRetries: config.lockRetries,
    lockBackoffMs: config.lockBackoffMs,
    logger: createConsoleLogger('sequence'),
  });
  const reconciler = new SyncReconciler(catalog, { clock, audit, logger: createConsoleLogger('sync-reconciler') });
  const ingestor = new BillIngestor({
    bills: new BillsRepository(db),
    catalog,
    vendors,
    sequence,
    tax: new TaxEngine(rates, createConsoleLogger('tax')),
    clock,
    audit,
    logger: createConsoleLogger('bills'),
  });

  const api = createApiServer(
    { vendors, reconciler, ingestor, sequence },
    { maxBodyBytes: config.maxBodyBytes, audit, logger: createConsoleLogger('api-server') },
  );
  await api.listen(config.port, config.host);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`received ${signal}, shutting down`);
    api
      .close()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('shutdown failed', error);
        db.close();
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  logger.error('failed to start', error);
  process.exitCode = 1;
});
