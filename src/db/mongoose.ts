/**
 * MongoDB connection (Mongoose)
 */

import mongoose from 'mongoose';
import type { Logger } from '../common/host.deps.js';
import { defaultLogger } from '../common/host.deps.js';

export async function connectMongo(
  url: string,
  dbName: string,
  logger: Logger = defaultLogger
): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  mongoose.set('strictQuery', true);
  await mongoose.connect(url, {
    dbName,
    autoIndex: false,
    serverSelectionTimeoutMS: 10_000,
  });

  logger.info({ dbName }, '[DB] MongoDB connected');
  return mongoose;
}

export async function disconnectMongo(logger: Logger = defaultLogger): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  logger.info({}, '[DB] MongoDB disconnected');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}

/** Duplicate key error raised by a unique index. */
export function isDuplicateKeyError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 11000
  );
}

export { mongoose };
