/**
 * Error Handler Middleware
 *
 * Express用のエラーハンドリングミドルウェア
 */

import type { Request, Response, NextFunction } from 'express';
import { DomainError } from '@pvrcheck/common-types';

/**
 * エラーハンドリングミドルウェア
 *
 * ドメインエラーを適切なHTTPステータスコードに変換してレスポンス
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // レスポンスが既に送信されている場合はデフォルトのエラーハンドラーに委譲
  if (res.headersSent) {
    return next(error);
  }

  console.error(`❌ [Server] ${req.method} ${req.path} failed:`, {
    error: error.message,
    code: error instanceof DomainError ? error.code : undefined,
    stack: error.stack,
  });

  if (error instanceof DomainError) {
    handleDomainError(error, res);
  } else if (isBodyParseError(error)) {
    res.status(400).json({ error: 'Invalid JSON body' });
  } else {
    handleGenericError(error, res);
  }
}

/**
 * express.json() が投げる JSON パースエラー
 */
function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * ドメインエラーをHTTPレスポンスに変換
 */
function handleDomainError(error: DomainError, res: Response): void {
  const statusCode = getStatusCodeForDomainError(error);

  res.status(statusCode).json({
    error: error.message,
    code: error.code,
  });
}

/**
 * ドメインエラーコードをHTTPステータスコードに変換
 */
function getStatusCodeForDomainError(error: DomainError): number {
  switch (error.code) {
    // 404 Not Found
    case 'RECORDING_NOT_FOUND':
      return 404;

    // 400 Bad Request
    case 'INVALID_STATE_TRANSITION':
    case 'INVALID_OPERATION':
      return 400;

    // 422 Unprocessable Entity (プローブできない録画)
    case 'UNPROBEABLE_SIZE':
    case 'PARSE_ERROR':
      return 422;

    // 502 Bad Gateway (PVRサーバーへの接続エラー)
    case 'NETWORK_ERROR':
    case 'CATALOG_ERROR':
      return 502;

    // 503 Service Unavailable (シャットダウン中のキャンセル)
    case 'PROBE_CANCELLED':
      return 503;

    // 500 Internal Server Error
    case 'CACHE_ACCESS_ERROR':
      return 500;

    // デフォルトは500
    default:
      return 500;
  }
}

/**
 * 汎用エラーをHTTPレスポンスに変換
 */
function handleGenericError(error: Error, res: Response): void {
  // 本番環境では詳細なエラーメッセージを隠す
  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    error: isDevelopment ? error.message : 'Internal server error',
    ...(isDevelopment && { stack: error.stack }),
  });
}

/**
 * 非同期ルートハンドラーをラップしてエラーを next() に渡す
 *
 * 使用例:
 * router.get('/path', asyncHandler(async (req, res) => {
 *   const result = await someAsyncOperation();
 *   res.json(result);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
