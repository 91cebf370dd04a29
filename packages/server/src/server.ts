import dotenv from 'dotenv';
import { createServer } from 'http';
import { closePool } from '@pvrcheck/verifier';
import { setupContainer } from './infrastructure/di/setupContainer.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

const PORT = process.env.PORT || 3000;
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const CORS_ORIGIN = process.env.CORS_ORIGIN || '*';

async function main(): Promise<void> {
  // インラインのパスはシャットダウン時に中断する
  const session = new AbortController();

  const container = await setupContainer({ signal: session.signal });
  const app = createApp(container, { corsOrigin: CORS_ORIGIN, logLevel: LOG_LEVEL });
  const httpServer = createServer(app);

  httpServer.listen(PORT, () => {
    console.log(`🚀 [Server] pvrcheck API running on port ${PORT}`);
    console.log(`📊 [Server] Log level: ${LOG_LEVEL}`);
    console.log(`🏥 [Server] Health check: http://localhost:${PORT}/health`);
  });

  // 検証パスは数分かかることがある
  httpServer.timeout = 300000;
  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000;

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n🛑 [Server] Received ${signal}, shutting down gracefully...`);
    session.abort();
    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      const queue = container.resolve('VerificationPassQueue');
      if (queue) {
        await queue.close();
      }
      await closePool();
      console.log('✅ [Server] Shutdown complete');
    } catch (err) {
      console.error('❌ [Server] Error during shutdown:', err);
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('❌ [Server] Fatal error:', err);
  process.exit(1);
});
