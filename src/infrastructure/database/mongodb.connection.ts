import { Db, MongoClient } from "mongodb";

export interface MongoSettings {
  uri: string;
  dbName: string;
  serverSelectionTimeoutMs?: number;
}

let client: MongoClient | null = null;
let connected: Db | null = null;

/**
 * Opens the shared client once and checks the server answers before any job
 * is written. Later calls reuse the same database handle.
 */
export async function connectToMongoDB(settings: MongoSettings): Promise<Db> {
  if (connected) {
    return connected;
  }

  // Optional job fields are left out of documents rather than stored as null
  const candidate = new MongoClient(settings.uri, {
    ignoreUndefined: true,
    appName: "video-slides-service",
    serverSelectionTimeoutMS: settings.serverSelectionTimeoutMs ?? 10000,
  });

  try {
    await candidate.connect();
    const db = candidate.db(settings.dbName);
    await db.command({ ping: 1 });
    client = candidate;
    connected = db;
    console.log(`[MongoDB] Connected to database ${settings.dbName}`);
    return db;
  } catch (error) {
    console.error(`[MongoDB] Could not connect to ${settings.dbName}:`, error);
    await candidate.close().catch((closeError) => {
      console.warn("[MongoDB] Closing the failed client also failed:", closeError);
    });
    throw error;
  }
}

export async function closeMongoDBConnection(): Promise<void> {
  if (!client) {
    return;
  }
  await client.close();
  client = null;
  connected = null;
  console.log("[MongoDB] Connection closed");
}
