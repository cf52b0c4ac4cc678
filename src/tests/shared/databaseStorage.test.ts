/**
 * DatabaseStorage with file-based SQLite
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DatabaseStorage } from '../../shared/storage/databaseStorage';

function removeDatabase(dbPath: string): void {
  for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (fs.existsSync(file)) fs.unlinkSync(file);
  }
}

describe('DatabaseStorage with file-based SQLite', () => {
  let dbPath: string;

  beforeEach(() => {
    dbPath = path.join(os.tmpdir(), `collection-db-${process.pid}-${Date.now()}.db`);
  });

  afterEach(() => {
    removeDatabase(dbPath);
  });

  it('should persist elements across connections', async () => {
    const first = new DatabaseStorage({ databasePath: dbPath, userId: 'user-1' });
    await first.write('albums/trip/photo.jpg', Buffer.from([1, 2, 3]));
    first.close();

    const second = new DatabaseStorage({ databasePath: dbPath, userId: 'user-1' });
    try {
      expect([...(await second.read('albums/trip/photo.jpg'))]).toEqual([1, 2, 3]);
      expect((await second.listWithMetadata('albums')).map(entry => entry.path)).toEqual(['albums/trip']);
    } finally {
      second.close();
    }
  });

  it('should migrate an existing database only once', async () => {
    const first = new DatabaseStorage({ databasePath: dbPath, userId: 'user-1' });
    await first.write('a.md', Buffer.from('a'));
    first.close();

    const second = new DatabaseStorage({ databasePath: dbPath, userId: 'user-1' });
    try {
      expect((await second.read('a.md')).toString()).toBe('a');
    } finally {
      second.close();
    }
  });

  it('should keep users apart in the same file', async () => {
    const alice = new DatabaseStorage({ databasePath: dbPath, userId: 'alice' });
    const bob = alice.forUser('bob');
    try {
      await alice.write('notes/a.md', Buffer.from('alice'));

      expect(await bob.getMetadata('notes/a.md')).toBeNull();
      await expect(bob.listWithMetadata('notes')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    } finally {
      alice.close();
    }
  });
});
