// 解決クラス
export {
  TwemojiResolver,
  TWEMOJI_BASE_URL,
  TWEMOJI_TOKEN_PATTERN,
  DEFAULT_ICON_SIZE,
  isIconSize,
  formatTwemojiUrl,
  formatImageTag,
} from './twemojiResolver.js';
export type { TwemojiResolverOptions } from './twemojiResolver.js';

// データセット
export {
  BUNDLED_DATASET_PATH,
  loadTwemojiIndex,
  loadEmojiDatasource,
  parseDataset,
} from './dataset.js';

export { unicodeFromUtf8 } from './codepoint.js';
export { ConfigurationError, LookupError } from './errors.js';
