import { readFileSync } from 'fs';
import { createRequire } from 'module';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './errors.js';
import type { EmojiRecord, StandardEmojiEntry } from '../types/index.js';

// ESM用の __dirname 代替
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** 同梱の Twemoji インデックス（src/emoji と dist/emoji のどちらからも ../../data） */
export const BUNDLED_DATASET_PATH = path.join(__dirname, '../../data/twemoji-index.json');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSONとしてパース済みの値を EmojiRecord の配列として検証する
 * @param data JSON.parse の結果
 * @param source エラーメッセージに含めるデータの出所
 * @throws ConfigurationError 配列でない、またはレコードの形式が不正な場合
 */
export function parseDataset(data: unknown, source: string): EmojiRecord[] {
  if (!Array.isArray(data)) {
    throw new ConfigurationError(`Invalid emoji dataset (${source}): expected an array`);
  }

  return data.map((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry['name'] !== 'string' ||
      typeof entry['unicode'] !== 'string' ||
      typeof entry['description'] !== 'string'
    ) {
      throw new ConfigurationError(
        `Invalid emoji dataset (${source}): entry ${index} must have string name, unicode and description`
      );
    }
    return {
      name: entry['name'],
      unicode: entry['unicode'],
      description: entry['description'],
    };
  });
}

/**
 * Twemoji インデックスのJSONファイルを読み込む
 * @param filePath 省略時は同梱のインデックス
 */
export function loadTwemojiIndex(filePath: string = BUNDLED_DATASET_PATH): EmojiRecord[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read emoji dataset ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ConfigurationError(`Invalid emoji dataset (${filePath}): not valid JSON`);
  }

  return parseDataset(data, filePath);
}

/**
 * emoji-datasource の emoji.json を EmojiRecord の配列に変換
 * short_name を名前、unified を小文字化して unicode、name を小文字化して説明に使う
 */
export function loadEmojiDatasource(): EmojiRecord[] {
  const require = createRequire(import.meta.url);
  const emojiDataPath = require.resolve('emoji-datasource/emoji.json');
  const emojiData: StandardEmojiEntry[] = JSON.parse(
    readFileSync(emojiDataPath, 'utf-8')
  );

  return emojiData.map((emoji) => ({
    name: emoji.short_name,
    unicode: emoji.unified.toLowerCase(),
    description: (emoji.name || emoji.short_name).toLowerCase(),
  }));
}
