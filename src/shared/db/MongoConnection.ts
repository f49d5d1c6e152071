// src/shared/db/MongoConnection.ts

/**
 * Central mongoose connection for the userhub service.
 *
 * This module ensures there is only one connection per process.
 * Models registered on the default mongoose instance use it automatically.
 */

import mongoose from 'mongoose';
import { getDatabaseUrl } from '../config/Config';
import { logger } from '../logging/Logger';

let connecting: Promise<typeof mongoose> | null = null;

/**
 * Open the shared connection (idempotent).
 */
export async function connectMongo(url: string = getDatabaseUrl()): Promise<void> {
  if (connecting === null) {
    connecting = mongoose.connect(url, { serverSelectionTimeoutMS: 5_000 });
  }

  try {
    await connecting;
    logger.info({ host: mongoose.connection.host }, 'MongoDB connection established');
  } catch (err) {
    connecting = null;
    throw err;
  }
}

/**
 * Gracefully close the connection.
 * Call this from shutdown handlers if needed.
 */
export async function disconnectMongo(): Promise<void> {
  if (connecting !== null) {
    connecting = null;
    await mongoose.disconnect();
  }
}
