/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

export { mongoose };

export async function connectMongo(url: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(url, { serverSelectionTimeoutMS: 10_000 });
  console.log(`[DB] Connected to MongoDB (${mongoose.connection.name})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected');
}
