/**
 * 設定値（アイコンサイズ、データセット、環境変数）が不正な場合にスローされるエラー
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * インデックスに存在しないトークン・コードポイントを参照した場合にスローされるエラー
 */
export class LookupError extends Error {
  readonly key: string;

  constructor(key: string, message: string = `Unknown emoji: ${key}`) {
    super(message);
    this.name = 'LookupError';
    this.key = key;
  }
}
