import localforage from 'localforage';
import * as memoryDriver from 'localforage-driver-memory';

/**
 * Points localforage at the in-memory driver. IndexedDB and localStorage are
 * not available under Node, so this must run before the note storage is used.
 */
export const configureStorage = async (options: { name?: string } = {}): Promise<void> => {
  const name = options.name ?? 'notes';

  localforage.config({ name, storeName: 'notes' });
  await localforage.defineDriver(memoryDriver);
  await localforage.setDriver(memoryDriver._driver);

  console.log(`[NoteStore] Using ${localforage.driver()} driver for "${name}".`);
};
