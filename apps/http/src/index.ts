// apps/http/src/index.ts
import { MySQLCountSource } from '@logodds/source-mysql';
import { MongoCountSource } from '@logodds/source-mongo';
import { buildApp } from './app';
import { loadConfig } from './config';

async function main() {
  const config = loadConfig();

  const mysql = new MySQLCountSource();
  await mysql.init({ uri: config.mysqlUri });

  const mongo = new MongoCountSource();

  const app = await buildApp({ config, sources: { mysql, mongo } });

  // the pool connects lazily; Mongo connects up front, /readyz reports it until it is up
  try {
    await mongo.init({ uri: config.mongoUri, db: config.mongoDb });
  } catch (err) {
    app.log.warn({ err }, 'mongo-connect-failed');
  }

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([mysql.close(), mongo.close(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`HTTP on :${config.port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
