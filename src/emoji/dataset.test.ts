import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { loadEmojiDatasource, loadTwemojiIndex, parseDataset } from './dataset.js';
import { ConfigurationError } from './errors.js';

describe('parseDataset', () => {
  it('name・unicode・description だけを取り出す', () => {
    const result = parseDataset(
      [{ name: 'fire', unicode: '1f525', description: 'fire', category: 'nature' }],
      'test'
    );

    expect(result).toEqual([{ name: 'fire', unicode: '1f525', description: 'fire' }]);
  });

  it('配列でなければ ConfigurationError', () => {
    expect(() => parseDataset({ fire: '1f525' }, 'test')).toThrow(
      'Invalid emoji dataset (test): expected an array'
    );
  });

  it('不正なエントリはインデックス付きで報告する', () => {
    const data = [
      { name: 'fire', unicode: '1f525', description: 'fire' },
      { name: 'zap', unicode: 0x26a1, description: 'high voltage sign' },
    ];

    expect(() => parseDataset(data, 'test')).toThrow(ConfigurationError);
    expect(() => parseDataset(data, 'test')).toThrow(
      'Invalid emoji dataset (test): entry 1 must have string name, unicode and description'
    );
  });

  it('null のエントリも不正', () => {
    expect(() => parseDataset([null], 'test')).toThrow(
      'Invalid emoji dataset (test): entry 0 must have string name, unicode and description'
    );
  });
});

describe('loadTwemojiIndex', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'twemoji-index-'));
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('同梱のインデックスを読み込む', () => {
    const records = loadTwemojiIndex();

    expect(records).toHaveLength(66);
    expect(records[0]).toEqual({ name: 'grinning', unicode: '1f600', description: 'grinning face' });
    expect(records.find((record) => record.name === 'us')?.unicode).toBe('1f1fa-1f1f8');
  });

  it('指定したファイルを読み込む', () => {
    const filePath = path.join(tempDir, 'custom.json');
    writeFileSync(
      filePath,
      JSON.stringify([{ name: 'party', unicode: '1f973', description: 'face with party horn and party hat' }])
    );

    expect(loadTwemojiIndex(filePath)).toEqual([
      { name: 'party', unicode: '1f973', description: 'face with party horn and party hat' },
    ]);
  });

  it('JSONとして不正なら ConfigurationError', () => {
    const filePath = path.join(tempDir, 'broken.json');
    writeFileSync(filePath, '[{"name": ');

    expect(() => loadTwemojiIndex(filePath)).toThrow(
      `Invalid emoji dataset (${filePath}): not valid JSON`
    );
  });

  it('ファイルがなければ ConfigurationError', () => {
    const filePath = path.join(tempDir, 'missing.json');

    expect(() => loadTwemojiIndex(filePath)).toThrow(ConfigurationError);
    expect(() => loadTwemojiIndex(filePath)).toThrow(`Failed to read emoji dataset ${filePath}`);
  });
});

describe('loadEmojiDatasource', () => {
  it('short_name・小文字の unified・小文字の name に変換する', () => {
    const records = loadEmojiDatasource();

    expect(records.find((record) => record.name === 'grinning')).toEqual({
      name: 'grinning',
      unicode: '1f600',
      description: 'grinning face',
    });
  });

  it('unicode は全て小文字', () => {
    const records = loadEmojiDatasource();

    expect(records.length).toBeGreaterThan(1000);
    expect(records.filter((record) => record.unicode !== record.unicode.toLowerCase())).toEqual([]);
  });
});
