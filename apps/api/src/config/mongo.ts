import { MongoClient, type Collection, type Db, type Document } from 'mongodb';

import { env } from './env.js';
import { logger } from '../core/logger/index.js';

let client: MongoClient | null = null;
let connecting: Promise<MongoClient> | null = null;

export async function getMongoClient(): Promise<MongoClient> {
  if (client) {
    return client;
  }

  if (connecting) {
    return connecting;
  }

  const candidate = new MongoClient(env.MONGODB_URI, {
    appName: 'mailbox-provisioning',
  });

  connecting = candidate
    .connect()
    .then((connected) => {
      client = connected;
      logger.info('MongoDB client connected');
      return connected;
    })
    .catch((error: unknown) => {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      // Don't log as error if MongoDB is simply not running (ECONNREFUSED)
      if (errorMessage.includes('ECONNREFUSED')) {
        logger.warn({ err: error }, 'MongoDB connection refused - is MongoDB running?');
      } else {
        logger.error({ err: error }, 'Failed to connect to MongoDB');
      }
      throw error;
    })
    .finally(() => {
      connecting = null;
    });

  return connecting;
}

export async function getDatabase(): Promise<Db> {
  const mongoClient = await getMongoClient();
  return mongoClient.db();
}

export async function getCollection<TSchema extends Document = Document>(name: string): Promise<Collection<TSchema>> {
  const db = await getDatabase();
  return db.collection<TSchema>(name);
}

export async function closeMongoClient() {
  if (client) {
    await client.close();
    client = null;
  }
}
