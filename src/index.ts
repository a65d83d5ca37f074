export {
  TwemojiResolver,
  TWEMOJI_BASE_URL,
  TWEMOJI_TOKEN_PATTERN,
  DEFAULT_ICON_SIZE,
  isIconSize,
  formatTwemojiUrl,
  formatImageTag,
  BUNDLED_DATASET_PATH,
  loadTwemojiIndex,
  loadEmojiDatasource,
  parseDataset,
  unicodeFromUtf8,
  ConfigurationError,
  LookupError,
} from './emoji/index.js';
export type { TwemojiResolverOptions } from './emoji/index.js';

export { loadConfig } from './config.js';
export type { AppConfig, DatasetSource } from './config.js';

export { SUPPORTED_ICON_SIZES } from './types/index.js';
export type {
  EmojiRecord,
  NameIndexEntry,
  CodepointIndexEntry,
  IconSize,
  ClassNames,
  StandardEmojiEntry,
  EmojiLookupResponse,
  RenderRequest,
  RenderResponse,
} from './types/index.js';
