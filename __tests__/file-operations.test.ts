/**
 * File Operations Tests
 * Loading and saving files, line-ending handling and I/O failures
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TextBuffer } from '../src/text-buffer';
import { LineEnding, NotificationType } from '../src/types/buffer-types';
import { testUtils } from './setup';

jest.setTimeout(15000);

describe('File Operations', () => {
  afterAll(async () => {
    await testUtils.cleanup();
  });

  describe('File Loading', () => {
    test('should load text file correctly', async () => {
      const content = 'Hello, World!\nThis is a test file.\nEnd of file.';
      const filePath = await testUtils.createTempFile(content);

      const buffer = await TextBuffer.openFile(filePath);

      expect(buffer.filename).toBe(filePath);
      expect(buffer.byteLength()).toBe(content.length);
      expect(buffer.getText()).toBe(content);
      expect(buffer.lineEnding).toBe(LineEnding.LF);
      expect(buffer.lineCount()).toEqual({ value: 3, exact: true });
    });

    test('should report the load as a notification', async () => {
      const filePath = await testUtils.createTempFile('one\ntwo\n');

      const buffer = await TextBuffer.openFile(filePath);

      const notifications = buffer.getNotifications();
      expect(notifications).toHaveLength(1);
      expect(notifications[0].type).toBe(NotificationType.BUFFER_OPENED);
      expect(notifications[0].metadata).toEqual({
        filename: filePath,
        size: 8,
        lineEnding: LineEnding.LF,
        lazyLines: false
      });
    });

    test('should normalize CRLF line endings', async () => {
      const filePath = await testUtils.createTempFile('first\r\nsecond\r\nthird');

      const buffer = await TextBuffer.openFile(filePath);

      expect(buffer.getText()).toBe('first\nsecond\nthird');
      expect(buffer.lineEnding).toBe(LineEnding.CRLF);
      expect(buffer.lineToByte(2).byteOffset).toBe(13);
    });

    test('should normalize lone CR line endings', async () => {
      const filePath = await testUtils.createTempFile('x\ry\rz');

      const buffer = await TextBuffer.openFile(filePath);

      expect(buffer.getText()).toBe('x\ny\nz');
      expect(buffer.lineEnding).toBe(LineEnding.CR);
    });

    test('should load UTF-8 files with multi-byte characters', async () => {
      const content = 'naïve café\n日本語\n';
      const filePath = await testUtils.createTempFile(content);

      const buffer = await TextBuffer.openFile(filePath);

      expect(buffer.byteLength()).toBe(Buffer.byteLength(content, 'utf8'));
      expect(buffer.getText()).toBe(content);
    });

    test('should load empty file correctly', async () => {
      const filePath = await testUtils.createTempFile('');

      const buffer = await TextBuffer.openFile(filePath);

      expect(buffer.byteLength()).toBe(0);
      expect(buffer.lineCount()).toEqual({ value: 1, exact: true });
    });

    test('should use lazy line numbering above the large-file threshold', async () => {
      const filePath = await testUtils.createTempFile(testUtils.fixedWidthLines(50, 20));

      const buffer = await TextBuffer.openFile(filePath, { largeFileThreshold: 512 });

      expect(buffer.lazyLines).toBe(true);
      expect(buffer.exactLines).toBe(false);
      expect(buffer.lineToByte(3).byteOffset).toBe(60);
    });

    test('should handle non-existent files appropriately', async () => {
      const missing = testUtils.getTempFilePath('.missing');

      await expect(TextBuffer.openFile(missing)).rejects.toThrow('Failed to open file:');
    });
  });

  describe('File Saving', () => {
    test('should save modified buffer to its own file', async () => {
      const filePath = await testUtils.createTempFile('hello world');
      const buffer = await TextBuffer.openFile(filePath);

      buffer.insert(5, ',');
      expect(buffer.isModified()).toBe(true);
      await buffer.saveFile();

      expect(await testUtils.readText(filePath)).toBe('hello, world');
      expect(buffer.isModified()).toBe(false);
      const saved = buffer.getNotifications().filter(n => n.type === NotificationType.FILE_SAVED);
      expect(saved).toHaveLength(1);
      expect(saved[0].metadata).toEqual({ filename: filePath, size: 12, lineEnding: LineEnding.LF });
    });

    test('should restore CRLF line endings on save', async () => {
      const filePath = await testUtils.createTempFile('a\r\nb\nc\r\n');
      const buffer = await TextBuffer.openFile(filePath);
      buffer.insert(buffer.byteLength(), 'd\n');

      await buffer.saveFile();

      expect(await testUtils.readText(filePath)).toBe('a\r\nb\r\nc\r\nd\r\n');
    });

    test('should restore CR line endings on save', async () => {
      const filePath = await testUtils.createTempFile('x\ry');
      const buffer = await TextBuffer.openFile(filePath);

      await buffer.saveFile();

      expect(await testUtils.readText(filePath)).toBe('x\ry');
    });

    test('should save as a new file and adopt its name', async () => {
      const original = await testUtils.createTempFile('original');
      const copy = testUtils.getTempFilePath();
      const buffer = await TextBuffer.openFile(original);
      buffer.replace(0, 8, 'changed');

      await buffer.saveFile(copy);

      expect(buffer.filename).toBe(copy);
      expect(await testUtils.readText(copy)).toBe('changed');
      expect(await testUtils.readText(original)).toBe('original');
    });

    test('should save a buffer opened from content', async () => {
      const target = testUtils.getTempFilePath();
      const buffer = TextBuffer.open('from memory\n');

      await buffer.saveFile(target);

      expect(await testUtils.readFile(target)).toEqual(Buffer.from('from memory\n'));
    });

    test('should handle saving empty buffer', async () => {
      const target = testUtils.getTempFilePath();
      const buffer = TextBuffer.open('');

      await buffer.saveFile(target);

      expect((await fs.stat(target)).size).toBe(0);
    });

    test('should require a filename', async () => {
      const buffer = TextBuffer.open('unnamed');

      await expect(buffer.saveFile()).rejects.toThrow('No filename specified');
    });

    test('should wrap write failures and leave no temporary file', async () => {
      const directory = path.join(os.tmpdir(), `chunked-buffer-missing-${process.pid}`);
      const target = path.join(directory, 'out.txt');
      const buffer = TextBuffer.open('content');

      await expect(buffer.saveFile(target)).rejects.toThrow('Failed to save file:');
      await expect(fs.access(`${target}.${process.pid}.tmp`)).rejects.toThrow();
      expect(buffer.filename).toBeNull();
    });

    test('should refuse to save a closed buffer', async () => {
      const buffer = TextBuffer.open('closed');
      buffer.close();

      await expect(buffer.saveFile(testUtils.getTempFilePath())).rejects.toThrow('Buffer is closed');
    });
  });
});
