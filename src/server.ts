import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig, validateConfig } from './config';
import { createContainer } from './container';

async function startServer(): Promise<void> {
  const config = loadConfig();

  try {
    validateConfig(config);
    console.log('✓ All required environment variables are set');
  } catch (error) {
    console.error('❌ Invalid configuration:', error instanceof Error ? error.message : error);
    console.error('Please check your .env file');
    process.exit(1);
  }

  const container = createContainer(config);
  const app = createApp(container);

  const server: Server = app.listen(config.port, () => {
    console.log('');
    console.log('📬 Outlook mailbox gateway is live!');
    console.log(`📍 Server running on port ${config.port}`);
    console.log(`🌍 Environment: ${config.nodeEnv}`);
    console.log('');
    console.log('Endpoints:');
    console.log('  GET  /health');
    console.log('  GET  /health/integrations');
    console.log('  GET  /emails?folder=&count=');
    console.log('  GET  /emails/search?query=&subject=&from=&hasAttachments=&unreadOnly=&folder=&count=');
    console.log('  GET  /emails/:id');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close(() => {
      container.database
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to close database pool:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
