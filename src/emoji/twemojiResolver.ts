import { unicodeFromUtf8 } from './codepoint.js';
import { loadTwemojiIndex } from './dataset.js';
import { ConfigurationError, LookupError } from './errors.js';
import {
  SUPPORTED_ICON_SIZES,
  type ClassNames,
  type CodepointIndexEntry,
  type EmojiRecord,
  type IconSize,
  type NameIndexEntry,
} from '../types/index.js';

// ============================================
// 固定テンプレート
// ============================================

/** Twemoji CDN のホストとパス */
export const TWEMOJI_BASE_URL = '//twemoji.maxcdn.com';

/** コロンで囲まれたトークンの正規表現ソース（空の "::" にもマッチする） */
export const TWEMOJI_TOKEN_PATTERN = ':[a-zA-Z0-9_]*:';

export const DEFAULT_ICON_SIZE: IconSize = 16;

/**
 * TwemojiResolver の設定オプション
 */
export interface TwemojiResolverOptions {
  /** インデックス化するレコード（省略時は同梱のインデックスを読み込む） */
  dataset?: readonly EmojiRecord[];
  /** true の場合、renderText は未知のトークンで LookupError をスローする */
  strict?: boolean;
}

export function isIconSize(size: number): size is IconSize {
  return SUPPORTED_ICON_SIZES.some((supported) => supported === size);
}

function describeSupportedSizes(): string {
  const sizes: number[] = [...SUPPORTED_ICON_SIZES];
  const last = sizes.pop();
  return `${sizes.join(', ')} or ${last}`;
}

/**
 * "//twemoji.maxcdn.com/<size>x<size>/<unicode>.png" 形式のURLを作る
 */
export function formatTwemojiUrl(iconSize: IconSize, unicode: string): string {
  return `${TWEMOJI_BASE_URL}/${iconSize}x${iconSize}/${unicode}.png`;
}

/**
 * <img src="..." alt="..." class="..."> を作る（クラスが空でも class 属性は残す）
 */
export function formatImageTag(src: string, alt: string, classNames: ClassNames): string {
  const classes = typeof classNames === 'string' ? classNames : classNames.join(' ');
  return `<img src="${src}" alt="${alt}" class="${classes}">`;
}

/**
 * 絵文字トークン・UTF-8文字を Twemoji の画像URL・imgタグに解決するクラス
 *
 * 構築時にデータセットから NameIndex（":name:" → unicode/説明）と
 * CodepointIndex（unicode → トークン/説明）を1パスで作り、以降は変更しない。
 */
export class TwemojiResolver {
  private readonly size: IconSize;
  private readonly strict: boolean;
  private readonly nameIndex = new Map<string, NameIndexEntry>();
  private readonly codepointIndex = new Map<string, CodepointIndexEntry>();

  /**
   * @param iconSize 16, 36, 72 のいずれか
   * @throws ConfigurationError サイズが未対応、またはデータセットが不正な場合
   */
  constructor(iconSize: number = DEFAULT_ICON_SIZE, options: TwemojiResolverOptions = {}) {
    // データセットを読む前にサイズを検証する
    if (!isIconSize(iconSize)) {
      throw new ConfigurationError(
        `Icon must be of size ${describeSupportedSizes()} (got ${iconSize})`
      );
    }
    this.size = iconSize;
    this.strict = options.strict ?? false;

    const dataset = options.dataset ?? loadTwemojiIndex();
    for (const emoji of dataset) {
      const token = `:${emoji.name}:`;

      // 重複キーは後勝ち
      if (this.nameIndex.has(token)) {
        console.warn(`Duplicate emoji name in dataset: ${token} (last entry wins)`);
      }
      if (this.codepointIndex.has(emoji.unicode)) {
        console.warn(`Duplicate emoji unicode in dataset: ${emoji.unicode} (last entry wins)`);
      }

      // findByName / findByUnicode が返すのでエントリは凍結する
      this.nameIndex.set(token, Object.freeze({
        unicode: emoji.unicode,
        description: emoji.description,
      }));
      this.codepointIndex.set(emoji.unicode, Object.freeze({
        token,
        description: emoji.description,
      }));
    }
  }

  get iconSize(): IconSize {
    return this.size;
  }

  /** インデックス化された名前の数 */
  get count(): number {
    return this.nameIndex.size;
  }

  // ============================================
  // 検索
  // ============================================

  findByName(token: string): NameIndexEntry | undefined {
    return this.nameIndex.get(token);
  }

  findByUnicode(unicode: string): CodepointIndexEntry | undefined {
    return this.codepointIndex.get(unicode);
  }

  /**
   * トークン（例: ":smile:"）の unicode 表現を取得
   * @throws LookupError 未知のトークン
   */
  unicodeForName(token: string): string {
    return this.requireName(token).unicode;
  }

  /**
   * UTF-8文字の unicode 表現を取得（インデックスは参照しない）
   */
  unicodeForUtf8Character(char: string): string {
    return unicodeFromUtf8(char);
  }

  /**
   * @throws LookupError 未知のトークン
   */
  descriptionForName(token: string): string {
    return this.requireName(token).description;
  }

  /**
   * @throws LookupError 変換後の unicode がインデックスにない場合
   */
  descriptionForUtf8(char: string): string {
    return this.requireUnicode(unicodeFromUtf8(char)).description;
  }

  /**
   * UTF-8文字に対応するトークン（例: ":smile:"）を取得
   * @throws LookupError 変換後の unicode がインデックスにない場合
   */
  tokenForUtf8(char: string): string {
    return this.requireUnicode(unicodeFromUtf8(char)).token;
  }

  description(emoji: string, byName: boolean = true): string {
    return byName ? this.descriptionForName(emoji) : this.descriptionForUtf8(emoji);
  }

  // ============================================
  // レンダリング
  // ============================================

  buildUrl(emoji: string, byName: boolean = true): string {
    const unicode = byName ? this.unicodeForName(emoji) : this.unicodeForUtf8Character(emoji);
    return formatTwemojiUrl(this.size, unicode);
  }

  buildImageTag(emoji: string, byName: boolean = true, classNames: ClassNames = ''): string {
    return formatImageTag(
      this.buildUrl(emoji, byName),
      this.description(emoji, byName),
      classNames
    );
  }

  /**
   * テキスト中の :name: トークンを imgタグに置換する
   *
   * 左から右への1パスで、置換結果は再走査しない。
   * 未知のトークンは strict でなければそのまま残し、strict なら LookupError をスローする。
   */
  renderText(text: string, byName: boolean = true, classNames: ClassNames = ''): string {
    // lastIndex を共有しないよう呼び出しごとに生成する
    return text.replace(new RegExp(TWEMOJI_TOKEN_PATTERN, 'g'), (token) => {
      try {
        return this.buildImageTag(token, byName, classNames);
      } catch (error) {
        if (error instanceof LookupError && !this.strict) {
          return token;
        }
        throw error;
      }
    });
  }

  private requireName(token: string): NameIndexEntry {
    const entry = this.nameIndex.get(token);
    if (!entry) {
      throw new LookupError(token);
    }
    return entry;
  }

  private requireUnicode(unicode: string): CodepointIndexEntry {
    const entry = this.codepointIndex.get(unicode);
    if (!entry) {
      throw new LookupError(unicode, `Unknown emoji codepoint: ${unicode}`);
    }
    return entry;
  }
}
