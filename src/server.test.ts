import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer } from 'http';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { createResolver, listen, loadDataset } from './server.js';
import { ConfigurationError } from './emoji/errors.js';
import type { AppConfig } from './config.js';

const BASE_CONFIG: AppConfig = {
  port: 3000,
  iconSize: 16,
  source: 'bundled',
  datasetPath: undefined,
  strict: false,
};

describe('loadDataset', () => {
  let tempDir: string;
  let customPath: string;

  beforeAll(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'twemoji-server-'));
    customPath = path.join(tempDir, 'custom.json');
    writeFileSync(
      customPath,
      JSON.stringify([{ name: 'tada', unicode: '1f389', description: 'party popper' }])
    );
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('bundled なら同梱のインデックスを読み込む', () => {
    expect(loadDataset(BASE_CONFIG)).toHaveLength(66);
  });

  it('TWEMOJI_DATASET は TWEMOJI_SOURCE より優先する', () => {
    const records = loadDataset({
      ...BASE_CONFIG,
      source: 'emoji-datasource',
      datasetPath: customPath,
    });

    expect(records).toEqual([{ name: 'tada', unicode: '1f389', description: 'party popper' }]);
  });

  it('emoji-datasource から読み込める', () => {
    const records = loadDataset({ ...BASE_CONFIG, source: 'emoji-datasource' });

    expect(records.find((record) => record.name === 'tada')?.unicode).toBe('1f389');
  });
});

describe('createResolver', () => {
  it('設定のアイコンサイズで構築する', () => {
    const resolver = createResolver({ ...BASE_CONFIG, iconSize: 36 });

    expect(resolver.iconSize).toBe(36);
    expect(resolver.buildUrl(':tada:')).toBe('//twemoji.maxcdn.com/36x36/1f389.png');
  });

  it('未対応のアイコンサイズは ConfigurationError', () => {
    expect(() => createResolver({ ...BASE_CONFIG, iconSize: 48 })).toThrow(ConfigurationError);
  });

  it('strict が renderText に反映される', () => {
    const resolver = createResolver({ ...BASE_CONFIG, strict: true });

    expect(() => resolver.renderText(':nope:')).toThrow('Unknown emoji: :nope:');
  });
});

describe('listen', () => {
  it('待ち受けを開始できる', async () => {
    const server = createServer();

    await listen(server, 0);

    expect(server.listening).toBe(true);
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('使用中のポートでは EADDRINUSE で reject する', async () => {
    const first = createServer();
    await listen(first, 0);
    const address = first.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }

    const second = createServer();
    try {
      await expect(listen(second, address.port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
      expect(second.listening).toBe(false);
    } finally {
      await new Promise<void>((resolve) => first.close(() => resolve()));
    }
  });
});
