import { createApp } from './app.js';
import { initConfig } from './config/index.js';
import { createConfiguredProvider } from './providers/registry.js';
import type { SignatureEnvelopePort } from './providers/types.js';

// ─── Initialize Configuration ────────────────────────────────────────

const config = initConfig();
console.log('✓ Configuration validated');

// ─── Initialize Provider ─────────────────────────────────────────────

function initProvider(): SignatureEnvelopePort {
  try {
    return createConfiguredProvider(config);
  } catch (error) {
    console.error('✗ Provider initialization failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const provider = initProvider();
console.log(`✓ E-signature provider: ${provider.displayName} (${provider.providerId})`);

// ─── Start Server ────────────────────────────────────────────────────

const app = createApp({ ...config, provider });

const server = app.listen(config.port, () => {
  console.log(`✓ E-signature gateway listening on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Remote API: ${config.logalty.baseUrl}`);
});

server.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`\n✗ Port ${config.port} is already in use.`);
    console.error(`  Use a different port:  PORT=${config.port + 1} npm start\n`);
  } else {
    console.error('✗ Server error:', err);
  }
  process.exit(1);
});

// ─── Graceful Shutdown ───────────────────────────────────────────────

const gracefulShutdown = (signal: string) => {
  console.log(`\n${signal} received. Shutting down gracefully...`);

  server.close(() => {
    console.log('✓ HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
