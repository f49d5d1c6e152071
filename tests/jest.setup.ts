/**
 * Global Jest setup/teardown.
 *
 * Ensures the process exits cleanly by closing shared resources
 * such as the mongoose connection (if one was opened during tests).
 */

import { disconnectMongo } from '../src/shared/db/MongoConnection';

afterAll(async () => {
  await disconnectMongo();
});
