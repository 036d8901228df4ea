import http from 'http';
import { createApp } from './app';
import { MemoCache } from './cache';
import { loadConfig } from './config';
import { Forecast } from './interfaces/forecast';
import { logger } from './logger';
import { ForecastService } from './modules/forecast';
import { GeocodingClient } from './modules/geocoding';
import { createHttpClient } from './modules/httpClient';

// -------------------------------------------------
// Config
// -------------------------------------------------
const config = loadConfig();

// -------------------------------------------------
// Upstream clients & cache
// -------------------------------------------------
const httpClient = createHttpClient(config.httpTimeoutMs);
const forecastCache = new MemoCache<Forecast>();

const geocoder = new GeocodingClient(httpClient, config.geocodingUrl);
const forecasts = new ForecastService({
  http: httpClient,
  url: config.forecastUrl,
  cache: forecastCache,
  ttlMs: config.forecastTtlMs,
});

// Expired entries are otherwise only dropped when read again.
const sweepTimer = setInterval(() => {
  const removed = forecastCache.sweep();
  if (removed > 0) {
    logger.debug({ removed }, 'Swept expired forecast cache entries');
  }
}, config.forecastTtlMs);
sweepTimer.unref();

// -------------------------------------------------
// HTTP Server
// -------------------------------------------------
const app = createApp({ geocoder, forecasts });
const server = http.createServer(app);

let isShuttingDown = false;

function shutdown(signal: string) {
  if (isShuttingDown) {
    logger.warn(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }
  isShuttingDown = true;

  logger.info(`Received ${signal}. Shutting down gracefully...`);

  clearInterval(sweepTimer);
  forecastCache.clear();

  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

server.listen(config.port, () => {
  logger.info({ env: config.nodeEnv }, `Server running on http://localhost:${config.port}`);
});
