import { ConfigurationError } from './emoji/errors.js';
import { DEFAULT_ICON_SIZE } from './emoji/twemojiResolver.js';

/** データセットの読み込み元 */
export type DatasetSource = 'bundled' | 'emoji-datasource';

export interface AppConfig {
  port: number;
  /** 検証は TwemojiResolver の構築時に行う */
  iconSize: number;
  source: DatasetSource;
  /** 独自データセットのパス（source より優先） */
  datasetPath: string | undefined;
  strict: boolean;
}

const DEFAULT_PORT = 3000;

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return Number(value.trim());
}

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
}

function parseSource(value: string | undefined): DatasetSource {
  if (value === undefined || value.trim() === '' || value === 'bundled') {
    return 'bundled';
  }
  if (value === 'emoji-datasource') {
    return value;
  }
  throw new ConfigurationError(
    `TWEMOJI_SOURCE must be "bundled" or "emoji-datasource", got "${value}"`
  );
}

/**
 * 環境変数から設定を読み込む
 * @param env 省略時は process.env（server.ts で dotenv/config を読み込み済み）
 * @throws ConfigurationError 値の形式が不正な場合
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const datasetPath = env['TWEMOJI_DATASET'];

  return {
    port: parseInteger('PORT', env['PORT'], DEFAULT_PORT),
    iconSize: parseInteger('TWEMOJI_ICON_SIZE', env['TWEMOJI_ICON_SIZE'], DEFAULT_ICON_SIZE),
    source: parseSource(env['TWEMOJI_SOURCE']),
    datasetPath: datasetPath ? datasetPath : undefined,
    strict: parseBoolean('TWEMOJI_STRICT', env['TWEMOJI_STRICT']),
  };
}
