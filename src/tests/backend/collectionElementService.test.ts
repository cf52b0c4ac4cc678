/**
 * Collection Element Service Tests
 *
 * Runs the service against MemoryStorage with a controllable clock and
 * spies on the adapter to check which backend calls happen.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CollectionElementService } from '../../backend/services/collectionElementService';
import { encodeToken } from '../../shared/elements';
import { ElementErrorCode } from '../../shared/errors';
import { MemoryStorage, StorageError } from '../../shared/storage';

const COLLECTION = encodeToken('/albums/trip');

describe('CollectionElementService', () => {
  let now: number;
  let storage: MemoryStorage;
  let timer: { start: ReturnType<typeof vi.fn>; stop: ReturnType<typeof vi.fn> };
  let service: CollectionElementService;

  const createNote = (name: string, content = 'text', tags: string[] = []) =>
    service.create(COLLECTION, { name, tags, extension: 'md', content });

  beforeEach(() => {
    now = 1000;
    storage = new MemoryStorage({ now: () => now });
    timer = { start: vi.fn(), stop: vi.fn() };
    service = new CollectionElementService(storage, { timer });
  });

  describe('create', () => {
    it('should create an image from an upload', async () => {
      const data = Buffer.from('0123456789').toString('base64');

      const element = await service.create(COLLECTION, { file: { fileName: 'photo.jpg', data } });

      expect(element).toEqual({
        type: 'image',
        name: 'photo',
        tags: [],
        updated: new Date(1000 * 1000),
        size: 10,
        extension: 'jpg',
        encodedCollectionPath: COLLECTION,
        encodedElementBasename: encodeToken('photo.jpg'),
      });

      const fetched = await service.get(element.encodedElementBasename, COLLECTION);
      expect(fetched.size).toBe(10);
      expect(fetched.type).toBe('image');
      expect(fetched.content).toBeUndefined();
    });

    it('should write the cleaned basename into the collection', async () => {
      const element = await createNote('List', '- milk', ['home', 'weekly']);

      expect(element.name).toBe('List');
      expect(element.tags).toEqual(['home', 'weekly']);
      expect(storage.dump()).toEqual({ 'albums/trip/List #home #weekly.md': '- milk' });
    });

    it('should store links as internet shortcuts', async () => {
      await service.create(COLLECTION, { name: 'Docs', extension: 'link', content: 'https://example.com' });
      expect(storage.dump()).toEqual({ 'albums/trip/Docs.link': '[InternetShortcut]\nURL=https://example.com\n' });
    });

    it.each([
      ['empty text', { name: 'x', extension: 'md', content: '' }],
      ['an empty upload', { file: { fileName: 'x.png', data: '' } }],
      ['no content at all', { name: 'x', extension: 'md' }],
    ])('should fail EMPTY_CONTENT without writing for %s', async (_label, payload) => {
      const write = vi.spyOn(storage, 'write');

      await expect(service.create(COLLECTION, payload)).rejects.toMatchObject({ code: ElementErrorCode.EMPTY_CONTENT });
      expect(write).not.toHaveBeenCalled();
    });

    it('should fail ALREADY_EXISTS on a name collision', async () => {
      await createNote('List');
      await expect(createNote('List')).rejects.toMatchObject({ code: ElementErrorCode.ALREADY_EXISTS });
    });

    it('should fail WRITE_ERROR when the backend cannot write', async () => {
      vi.spyOn(storage, 'write').mockRejectedValue(new StorageError('WRITE_FAILED', 'albums/trip/x.md'));
      await expect(createNote('x')).rejects.toMatchObject({ code: ElementErrorCode.WRITE_ERROR });
    });

    it('should fail INVALID_PAYLOAD for a malformed payload', async () => {
      await expect(service.create(COLLECTION, { name: 42 })).rejects.toMatchObject({
        code: ElementErrorCode.INVALID_PAYLOAD,
      });
    });

    it('should fail UNSUPPORTED_ELEMENT_TYPE for unknown extensions', async () => {
      const data = Buffer.from('zip').toString('base64');
      await expect(service.create(COLLECTION, { file: { fileName: 'a.zip', data } })).rejects.toMatchObject({
        code: ElementErrorCode.UNSUPPORTED_ELEMENT_TYPE,
      });
    });
  });

  describe('list', () => {
    it('should order elements by timestamp', async () => {
      now = 300;
      await createNote('a');
      now = 100;
      await createNote('b');
      now = 200;
      await createNote('c');

      const elements = await service.list(COLLECTION);
      expect(elements.map(element => element.name)).toEqual(['b', 'c', 'a']);
    });

    it('should keep backend order for equal timestamps', async () => {
      await createNote('first');
      await createNote('second');
      await createNote('third');

      expect((await service.list(COLLECTION)).map(element => element.name)).toEqual(['first', 'second', 'third']);
    });

    it('should skip unsupported files and directories', async () => {
      await createNote('kept');
      await storage.write('albums/trip/archive.zip', Buffer.from('zip'));
      await storage.write('albums/trip/README', Buffer.from('no extension'));
      await storage.write('albums/trip/nested/deep.md', Buffer.from('deeper'));

      const elements = await service.list(COLLECTION);
      expect(elements.map(element => element.name)).toEqual(['kept']);
    });

    it('should return an empty list for a missing collection', async () => {
      expect(await service.list(encodeToken('/nowhere'))).toEqual([]);
    });

    it('should reject a malformed collection token', async () => {
      await expect(service.list('not base64!')).rejects.toMatchObject({ code: ElementErrorCode.MALFORMED_TOKEN });
    });
  });

  describe('get', () => {
    it('should load content for text kinds', async () => {
      const created = await createNote('List', '- milk');
      const element = await service.get(created.encodedElementBasename, COLLECTION);
      expect(element.content).toBe('- milk');
    });

    it('should fail UNSUPPORTED_ELEMENT_TYPE before any backend call', async () => {
      const getMetadata = vi.spyOn(storage, 'getMetadata');

      await expect(service.get(encodeToken('archive.zip'), COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.UNSUPPORTED_ELEMENT_TYPE,
      });
      expect(getMetadata).not.toHaveBeenCalled();
    });

    it('should fail MALFORMED_TOKEN for basenames that are not a single segment', async () => {
      await expect(service.get(encodeToken('../secret.md'), COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.MALFORMED_TOKEN,
      });
    });

    it('should fail NOT_FOUND for a missing element', async () => {
      await expect(service.get(encodeToken('missing.md'), COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.NOT_FOUND,
      });
    });

    it('should fail NOT_FOUND when the file vanishes between metadata and read', async () => {
      const created = await createNote('List');
      vi.spyOn(storage, 'read').mockRejectedValue(new StorageError('NOT_FOUND', 'albums/trip/List.md'));

      await expect(service.get(created.encodedElementBasename, COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.NOT_FOUND,
      });
    });
  });

  describe('getContent', () => {
    it('should answer not-modified without reading when the timestamp is equal', async () => {
      const created = await createNote('List', '- milk');
      const read = vi.spyOn(storage, 'read');

      const result = await service.getContent(created.encodedElementBasename, COLLECTION, {
        'if-modified-since': new Date(1000 * 1000).toUTCString(),
      });

      expect(result).toEqual({ status: 'not-modified', lastModified: new Date(1000 * 1000) });
      expect(read).not.toHaveBeenCalled();
    });

    it('should return the bytes when the stored timestamp is newer', async () => {
      const created = await createNote('List', '- milk');

      const result = await service.getContent(created.encodedElementBasename, COLLECTION, {
        'if-modified-since': new Date(999 * 1000).toUTCString(),
      });

      expect(result.status).toBe('ok');
      if (result.status === 'ok') {
        expect(result.content.toString('utf-8')).toBe('- milk');
        expect(result.mimetype).toBe('text/markdown');
        expect(result.size).toBe(6);
        expect(result.lastModified).toEqual(new Date(1000 * 1000));
      }
    });

    it('should match the header name in any case', async () => {
      const created = await createNote('List', '- milk');
      const read = vi.spyOn(storage, 'read');

      const result = await service.getContent(created.encodedElementBasename, COLLECTION, {
        'If-Modified-Since': new Date(1000 * 1000).toUTCString(),
      });

      expect(result.status).toBe('not-modified');
      expect(read).not.toHaveBeenCalled();
    });

    it('should take the first of repeated header values', async () => {
      const created = await createNote('List', '- milk');

      const result = await service.getContent(created.encodedElementBasename, COLLECTION, {
        'IF-MODIFIED-SINCE': [new Date(1000 * 1000).toUTCString(), new Date(0).toUTCString()],
      });

      expect(result.status).toBe('not-modified');
    });

    it('should ignore an unparseable header', async () => {
      const created = await createNote('List');
      const result = await service.getContent(created.encodedElementBasename, COLLECTION, {
        'if-modified-since': 'yesterday',
      });
      expect(result.status).toBe('ok');
    });

    it('should serve images as raw bytes', async () => {
      const data = Buffer.from([137, 80, 78, 71]).toString('base64');
      const created = await service.create(COLLECTION, { file: { fileName: 'dot.png', data } });

      const result = await service.getContent(created.encodedElementBasename, COLLECTION);
      expect(result.status === 'ok' && [...result.content]).toEqual([137, 80, 78, 71]);
      expect(result.status === 'ok' && result.mimetype).toBe('image/png');
    });
  });

  describe('update', () => {
    it('should rewrite content in place without renaming', async () => {
      const created = await createNote('List', '- milk', ['home']);
      const rename = vi.spyOn(storage, 'rename');
      const update = vi.spyOn(storage, 'update');

      now = 2000;
      const element = await service.update(created.encodedElementBasename, COLLECTION, { content: '- eggs' });

      expect(rename).not.toHaveBeenCalled();
      expect(update).toHaveBeenCalledTimes(1);
      expect(element.updated).toEqual(new Date(2000 * 1000));
      expect(storage.dump()).toEqual({ 'albums/trip/List #home.md': '- eggs' });
    });

    it('should rename before writing new content', async () => {
      const created = await createNote('List', '- milk', ['home']);
      const rename = vi.spyOn(storage, 'rename');
      const update = vi.spyOn(storage, 'update');

      const element = await service.update(created.encodedElementBasename, COLLECTION, {
        name: 'Groceries',
        content: '- eggs',
      });

      expect(rename).toHaveBeenCalledWith('/albums/trip/List #home.md', '/albums/trip/Groceries #home.md');
      expect(rename.mock.invocationCallOrder[0]).toBeLessThan(update.mock.invocationCallOrder[0]);
      expect(element.encodedElementBasename).toBe(encodeToken('Groceries #home.md'));
      expect(storage.dump()).toEqual({ 'albums/trip/Groceries #home.md': '- eggs' });
    });

    it('should retag without touching content', async () => {
      const created = await createNote('List', '- milk', ['home']);
      const update = vi.spyOn(storage, 'update');

      const element = await service.update(created.encodedElementBasename, COLLECTION, { tags: ['shop'] });

      expect(update).not.toHaveBeenCalled();
      expect(element.tags).toEqual(['shop']);
      expect(storage.dump()).toEqual({ 'albums/trip/List #shop.md': '- milk' });
    });

    it('should leave image bytes alone when an upload is sent', async () => {
      const data = Buffer.from('0123456789').toString('base64');
      const created = await service.create(COLLECTION, { file: { fileName: 'photo.jpg', data } });
      const update = vi.spyOn(storage, 'update');

      const element = await service.update(created.encodedElementBasename, COLLECTION, {
        file: { fileName: 'other.jpg', data: Buffer.from('XY').toString('base64') },
      });

      expect(update).not.toHaveBeenCalled();
      expect(element.size).toBe(10);
      expect(storage.dump()).toEqual({ 'albums/trip/photo.jpg': '0123456789' });
    });

    it('should rename an image and ignore an empty upload', async () => {
      const data = Buffer.from('0123456789').toString('base64');
      const created = await service.create(COLLECTION, { file: { fileName: 'photo.jpg', data } });

      const element = await service.update(created.encodedElementBasename, COLLECTION, {
        name: 'renamed',
        file: { fileName: 'photo.jpg', data: '' },
      });

      expect(element.encodedElementBasename).toBe(encodeToken('renamed.jpg'));
      expect(element.size).toBe(10);
      expect(storage.dump()).toEqual({ 'albums/trip/renamed.jpg': '0123456789' });
    });

    it('should keep the extension', async () => {
      const created = await createNote('List');
      const element = await service.update(created.encodedElementBasename, COLLECTION, { extension: 'txt' });
      expect(element.extension).toBe('md');
    });

    it('should fail NOT_FOUND for a missing element', async () => {
      await expect(service.update(encodeToken('missing.md'), COLLECTION, { name: 'x' })).rejects.toMatchObject({
        code: ElementErrorCode.NOT_FOUND,
      });
    });

    it('should fail CANNOT_RENAME when the new name is taken', async () => {
      const created = await createNote('a');
      await createNote('b');

      await expect(service.update(created.encodedElementBasename, COLLECTION, { name: 'b' })).rejects.toMatchObject({
        code: ElementErrorCode.CANNOT_RENAME,
      });
    });

    it('should fail EMPTY_CONTENT before renaming', async () => {
      const created = await createNote('a');
      const rename = vi.spyOn(storage, 'rename');

      await expect(
        service.update(created.encodedElementBasename, COLLECTION, { name: 'b', content: '' })
      ).rejects.toMatchObject({ code: ElementErrorCode.EMPTY_CONTENT });
      expect(rename).not.toHaveBeenCalled();
    });

    it('should fail NOT_FOUND when the renamed file vanishes before the write', async () => {
      const created = await createNote('a');
      vi.spyOn(storage, 'update').mockRejectedValue(new StorageError('NOT_FOUND', 'albums/trip/b.md'));

      await expect(
        service.update(created.encodedElementBasename, COLLECTION, { name: 'b', content: 'new' })
      ).rejects.toMatchObject({ code: ElementErrorCode.NOT_FOUND });
    });
  });

  describe('delete', () => {
    it('should be idempotent', async () => {
      const created = await createNote('List');

      await service.delete(created.encodedElementBasename, COLLECTION);
      await service.delete(created.encodedElementBasename, COLLECTION);

      expect(storage.dump()).toEqual({});
    });

    it('should fail UNSUPPORTED_ELEMENT_TYPE for unknown extensions', async () => {
      await expect(service.delete(encodeToken('a.exe'), COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.UNSUPPORTED_ELEMENT_TYPE,
      });
    });

    it('should fail WRITE_ERROR for other backend failures', async () => {
      const created = await createNote('List');
      vi.spyOn(storage, 'delete').mockRejectedValue(new Error('disk unplugged'));

      await expect(service.delete(created.encodedElementBasename, COLLECTION)).rejects.toMatchObject({
        code: ElementErrorCode.WRITE_ERROR,
      });
    });
  });

  describe('batchRename', () => {
    it('should rename each matched element once and leave unchanged ones alone', async () => {
      now = 1;
      await createNote('a', 'a', ['old', 'keep']);
      now = 2;
      await createNote('b', 'b', ['keep']);
      now = 3;
      await createNote('c', 'c', ['old']);
      const rename = vi.spyOn(storage, 'rename');

      const report = await service.batchRename(COLLECTION, () => true, file => file.removeTag('old'));

      expect(report).toEqual({
        renamed: [
          { from: 'a #old #keep.md', to: 'a #keep.md' },
          { from: 'c #old.md', to: 'c.md' },
        ],
        unchanged: 1,
        failures: [],
      });
      expect(rename).toHaveBeenCalledTimes(2);
      expect(Object.keys(storage.dump()).sort()).toEqual([
        'albums/trip/a #keep.md',
        'albums/trip/b #keep.md',
        'albums/trip/c.md',
      ]);
    });

    it('should only touch elements the predicate selects', async () => {
      await createNote('a', 'a', ['x']);
      await createNote('b', 'b', ['y']);

      const report = await service.batchRename(
        COLLECTION,
        element => element.tags.includes('x'),
        file => file.renameTag('x', 'z')
      );

      expect(report.renamed).toEqual([{ from: 'a #x.md', to: 'a #z.md' }]);
      expect(report.unchanged).toBe(0);
    });

    it('should report a failing element and carry on', async () => {
      now = 1;
      await createNote('x');
      now = 2;
      await createNote('x', 'x', ['t']);
      now = 3;
      await createNote('y', 'y', ['t']);

      const report = await service.batchRename(
        COLLECTION,
        element => element.tags.includes('t'),
        file => file.removeTag('t')
      );

      expect(report.renamed).toEqual([{ from: 'y #t.md', to: 'y.md' }]);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].basename).toBe('x #t.md');
      expect(report.failures[0].error.code).toBe(ElementErrorCode.CANNOT_RENAME);
    });

    it('should report a transform that leaves nothing to name the file', async () => {
      await storage.write('albums/trip/#only.md', Buffer.from('x'));

      const report = await service.batchRename(COLLECTION, () => true, file => file.removeTag('only'));

      expect(report.failures.map(failure => failure.error.code)).toEqual([ElementErrorCode.INVALID_PAYLOAD]);
    });
  });

  describe('getElementPath', () => {
    it('should join the collection path and the decoded basename', () => {
      expect(service.getElementPath(encodeToken('photo.jpg'), '/albums')).toBe('/albums/photo.jpg');
    });

    it('should reject dot segments', () => {
      expect(() => service.getElementPath(encodeToken('..'), '/albums')).toThrow('Badly encoded path or element name');
    });
  });

  describe('timing', () => {
    it('should time each public operation', async () => {
      await service.list(COLLECTION);

      expect(timer.start).toHaveBeenCalledWith('collection_element_list');
      expect(timer.stop).toHaveBeenCalledWith('collection_element_list');
    });

    it('should stop the timer when an operation fails', async () => {
      await expect(service.get(encodeToken('missing.md'), COLLECTION)).rejects.toThrow();

      expect(timer.start).toHaveBeenCalledWith('collection_element_get');
      expect(timer.stop).toHaveBeenCalledWith('collection_element_get');
    });
  });
});
