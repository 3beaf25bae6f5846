import { createApp } from './app.js';
import { getBibliographyIdMapper } from './bibliography.js';
import { getConfig } from './config.js';
import { errorMessage } from './errors.js';
import { getStylesheetCache } from './stylesheet-cache.js';

/**
 * Start the server
 */
async function bootstrap() {
  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const config = getConfig();
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : config.port;

  // Compile every stylesheet and load the bibliography table up front, so a
  // missing resource stops the server instead of failing the first render
  console.log(`Loading stylesheets from: ${config.xslDir}`);
  await getStylesheetCache().preload();
  getBibliographyIdMapper();

  const app = createApp();

  const server = app.listen(port, () => {
    console.log(`Entry renderer listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error(`Startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
