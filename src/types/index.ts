// ============================================
// データセットのレコード
// ============================================
export interface EmojiRecord {
  /** コロンなしの名前（例: "smile"） */
  name: string;
  /** 16進のコードポイント列（例: "1f604", "1f1fa-1f1f8"） */
  unicode: string;
  description: string;
}

// ============================================
// インデックスのエントリ
// ============================================

/** NameIndex の値（キーは ":name:" 形式のトークン） */
export interface NameIndexEntry {
  readonly unicode: string;
  readonly description: string;
}

/** CodepointIndex の値（キーは unicode 文字列） */
export interface CodepointIndexEntry {
  readonly token: string;
  readonly description: string;
}

// ============================================
// アイコンサイズ・クラス名
// ============================================
export const SUPPORTED_ICON_SIZES = [16, 36, 72] as const;

export type IconSize = (typeof SUPPORTED_ICON_SIZES)[number];

export type ClassNames = string | readonly string[];

// ============================================
// emoji-datasource のエントリ（使用するフィールドのみ）
// ============================================
export interface StandardEmojiEntry {
  unified: string;
  name?: string | null;
  short_name: string;
  short_names: string[];
}

// ============================================
// API レスポンス
// ============================================

/**
 * GET /api/emoji/:name のレスポンス
 */
export interface EmojiLookupResponse {
  success: boolean;
  token?: string;
  unicode?: string;
  description?: string;
  url?: string;
  image?: string;
  error?: string;
}

/**
 * POST /api/render のリクエスト
 */
export interface RenderRequest {
  text: string;
  byName?: boolean;
  classNames?: ClassNames;
}

/**
 * POST /api/render のレスポンス
 */
export interface RenderResponse {
  success: boolean;
  html?: string;
  error?: string;
}
