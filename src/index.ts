import { config as dotenvConfig } from 'dotenv';
import { CONFIG_PATH, loadConfig, watchConfig, type Config } from './config.js';
import { createClients, testConnections } from './clients/index.js';
import { openDatabase } from './db/schema.js';
import { ManagedPauseLedger } from './db/ledger.js';
import { ReportRepository } from './db/reports.js';
import { createServer } from './server.js';
import { Orchestrator, type ManagedDownloader, type OrchestratorSettings } from './services/orchestrator.js';
import { QueueScheduler } from './services/scheduler.js';
import { WebhookNotifier } from './services/notifier.js';
import { diskFreeSpace } from './services/space-evaluator.js';
import { formatBytes } from './utils/format.js';

dotenvConfig();

function toSettings(config: Config): OrchestratorSettings {
  return {
    commandTimeoutMs: config.commandTimeoutMs,
    maxActiveBytes: config.maxActiveBytes,
    ignoreCase: config.ignoreCase,
    policy: config.policy,
  };
}

function toManagedDownloaders(config: Config): ManagedDownloader[] {
  const clients = createClients(config.downloaders, config.commandTimeoutMs);
  return config.downloaders.map((downloader, index) => ({
    client: clients[index],
    directories: downloader.directories,
    maxActive: downloader.maxActive,
  }));
}

function printBanner(config: Config): void {
  console.log('=================================');
  console.log('  Space Guard');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log(`Tick interval: ${config.tickIntervalSeconds}s`);
  console.log(`Victim order: ${config.policy.victimOrder}, release order: ${config.policy.releaseOrder}`);
  for (const downloader of config.downloaders) {
    console.log(`Downloader ${downloader.id}: ${downloader.url} (max active ${downloader.maxActive}${downloader.tag ? `, tag ${downloader.tag}` : ''})`);
    for (const dir of downloader.directories) {
      console.log(`  ${dir.path} (watermark ${formatBytes(dir.lowWatermark)})`);
    }
  }
  console.log('');
}

async function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error('[Config]', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  printBanner(config);

  // Initialize database
  const db = openDatabase(config.dataPath);
  const ledger = new ManagedPauseLedger(db);
  const reports = new ReportRepository(db);

  const downloaders = toManagedDownloaders(config);
  await testConnections(downloaders.map((downloader) => downloader.client));

  const orchestrator = new Orchestrator(toSettings(config), {
    ledger,
    reports,
    freeSpace: diskFreeSpace,
    notifier: config.webhookUrl ? new WebhookNotifier(config.webhookUrl, config.commandTimeoutMs) : undefined,
  });
  const scheduler = new QueueScheduler(orchestrator, downloaders);

  const app = await createServer({ scheduler, ledger, reports });

  // Apply configuration changes without a restart
  const stopWatching = watchConfig((next) => {
    orchestrator.updateSettings(toSettings(next));
    scheduler.setDownloaders(toManagedDownloaders(next));
    if (next.tickIntervalSeconds !== config.tickIntervalSeconds) {
      scheduler.start(next.tickIntervalSeconds);
    }
    if (next.port !== config.port || next.dataPath !== config.dataPath || next.webhookUrl !== config.webhookUrl) {
      console.warn('[Config] port, dataPath and webhookUrl changes take effect after a restart');
    }
    config = next;
  }, CONFIG_PATH);

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    await stopWatching();
    await scheduler.stop();
    await app.close();
    db.close();
    process.exit(0);
  };
  process.once('SIGINT', () => {
    shutdown('SIGINT').catch(console.error);
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch(console.error);
  });

  scheduler.start(config.tickIntervalSeconds);

  // Start server
  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch(console.error);
