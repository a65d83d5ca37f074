import 'dotenv/config';
import express, { type Express } from 'express';
import helmet from 'helmet';
import { createServer, type Server } from 'http';
import { loadConfig, type AppConfig } from './config.js';
import { loadEmojiDatasource, loadTwemojiIndex } from './emoji/dataset.js';
import { TwemojiResolver } from './emoji/twemojiResolver.js';
import { createEmojiRouter } from './routes/emojiRoute.js';
import type { EmojiRecord } from './types/index.js';

// ============================================
// 初期化
// ============================================

/**
 * 設定に従ってデータセットを読み込む
 * TWEMOJI_DATASET が指定されていれば TWEMOJI_SOURCE より優先する
 */
export function loadDataset(config: AppConfig): EmojiRecord[] {
  if (config.datasetPath) {
    return loadTwemojiIndex(config.datasetPath);
  }
  return config.source === 'emoji-datasource' ? loadEmojiDatasource() : loadTwemojiIndex();
}

export function createResolver(config: AppConfig): TwemojiResolver {
  return new TwemojiResolver(config.iconSize, {
    dataset: loadDataset(config),
    strict: config.strict,
  });
}

/**
 * Express アプリケーションを作成（テストからも利用）
 */
export function createApp(resolver: TwemojiResolver): Express {
  const app = express();

  // セキュリティ: HTTPセキュリティヘッダーを設定
  app.use(helmet());

  // JSONボディパーサー
  app.use(express.json());

  app.use('/api', createEmojiRouter(resolver));

  return app;
}

/**
 * 指定ポートで待ち受けを開始する
 * ポート使用中などの 'error' は reject として呼び出し元に返す
 */
export function listen(server: Server, port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

// ============================================
// メイン処理
// ============================================
async function main(): Promise<void> {
  const config = loadConfig();

  // アイコンサイズが不正な場合はここで ConfigurationError
  const resolver = createResolver(config);
  console.log(
    `Loaded ${resolver.count} emoji (source=${config.datasetPath ?? config.source}, size=${resolver.iconSize})`
  );

  const httpServer = createServer(createApp(resolver));

  await listen(httpServer, config.port);
  console.log(`Server running on http://localhost:${config.port}`);

  // シャットダウンハンドラー
  const shutdown = (): void => {
    console.log('\nShutting down...');
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// テスト時は main() を実行しない
if (!process.env['VITEST']) {
  main().catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}

export { main };
