import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadConfig } from './utils/config.js';
import { initializeFromFileSystem } from './core/note-tree.js';
import { JsonSettingsStore } from './storage/json-settings-store.js';
import { LAST_FOLDER_SETTING, registerRoutes } from './api/routes.js';
import logger from './utils/logger.js';

async function main() {
  // Load configuration
  const config = loadConfig();
  logger.level = config.logLevel;

  // Load persisted settings
  const settings = new JsonSettingsStore(config.settingsPath);
  await settings.load();

  // Rebuild the note tree from disk
  const opened = initializeFromFileSystem(config.dataPath, config.trashPath);
  if (!opened.ok) {
    logger.error({ error: opened.error.message }, 'Failed to load notes. Exiting...');
    process.exit(1);
  }
  const tree = opened.value;
  logger.info({ dataPath: config.dataPath, trashPath: config.trashPath }, 'Initialized note tree');

  const lastFolder = settings.get(LAST_FOLDER_SETTING, '/');
  const restored = tree.changeCurrentFolder(lastFolder);
  if (!restored.ok) {
    logger.info({ lastFolder }, 'Last folder no longer exists, starting at the root');
  }

  // Initialize Fastify server
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  // Register CORS
  await app.register(cors, {
    origin: true,
  });

  // Register routes
  await registerRoutes(app, tree, settings, config);

  // Start server
  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    settings.set(LAST_FOLDER_SETTING, tree.getCurrentPath());
    await settings.save();
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
