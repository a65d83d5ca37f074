import { Router, type Request, type Response } from 'express';
import { LookupError } from '../emoji/errors.js';
import type { TwemojiResolver } from '../emoji/twemojiResolver.js';
import type {
  ClassNames,
  EmojiLookupResponse,
  RenderRequest,
  RenderResponse,
} from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isClassNames(value: unknown): value is ClassNames {
  if (typeof value === 'string') return true;
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * リクエストボディを RenderRequest として検証
 * @returns エラーメッセージ、または検証済みのリクエスト
 */
function parseRenderRequest(body: unknown): RenderRequest | string {
  if (!isRecord(body)) {
    return 'Request body must be a JSON object';
  }
  const { text, byName, classNames } = body;

  if (typeof text !== 'string') {
    return 'text is required';
  }
  if (byName !== undefined && typeof byName !== 'boolean') {
    return 'byName must be a boolean';
  }
  if (classNames !== undefined && !isClassNames(classNames)) {
    return 'classNames must be a string or an array of strings';
  }

  const request: RenderRequest = { text };
  if (byName !== undefined) request.byName = byName;
  if (classNames !== undefined) request.classNames = classNames;
  return request;
}

/**
 * 絵文字の検索・テキスト変換用ルーターを作成
 * @param resolver 構築済みの TwemojiResolver
 */
export function createEmojiRouter(resolver: TwemojiResolver): Router {
  const router = Router();

  /**
   * GET /api/emoji/:name
   * コロンなしの名前から unicode・説明・URL・imgタグを取得
   */
  router.get('/emoji/:name', (req: Request<{ name: string }>, res: Response<EmojiLookupResponse>) => {
    const token = `:${req.params.name}:`;
    const entry = resolver.findByName(token);
    if (!entry) {
      res.status(404).json({
        success: false,
        error: `Unknown emoji: ${token}`,
      });
      return;
    }

    res.json({
      success: true,
      token,
      unicode: entry.unicode,
      description: entry.description,
      url: resolver.buildUrl(token),
      image: resolver.buildImageTag(token),
    });
  });

  /**
   * POST /api/render
   * テキスト中の :name: トークンを imgタグに置換
   */
  router.post('/render', (req: Request, res: Response<RenderResponse>) => {
    const request = parseRenderRequest(req.body);
    if (typeof request === 'string') {
      res.status(400).json({
        success: false,
        error: request,
      });
      return;
    }

    try {
      const html = resolver.renderText(
        request.text,
        request.byName ?? true,
        request.classNames ?? ''
      );
      res.json({ success: true, html });
    } catch (error) {
      if (error instanceof LookupError) {
        res.status(422).json({
          success: false,
          error: error.message,
        });
      } else {
        console.error('Render error:', error);
        res.status(500).json({
          success: false,
          error: 'Internal server error',
        });
      }
    }
  });

  return router;
}
