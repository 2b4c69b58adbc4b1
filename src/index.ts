// Research Chat API
// Chat endpoint with web search and page fetch tools

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { buildServer } from './server.js';

const server = await buildServer({
  logger: {
    level: env.LOG_LEVEL,
    ...(env.NODE_ENV === 'production'
      ? {}
      : {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }),
  },
});

const shutdown = async (signal: string) => {
  server.log.info({ signal }, 'Shutting down');
  await server.close();
  process.exit(0);
};
const onSignal = (signal: string) => {
  shutdown(signal).catch((err) => {
    server.log.error(err);
    process.exit(1);
  });
};
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`🔎 Research Chat API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`📊 Health: http://${env.HOST}:${env.PORT}/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
