/**
 * ドメインエラーの基底クラス
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // prototypeチェーンの復元（TypeScriptのextends Errorの問題対応）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Recording関連エラー
 */
export class RecordingNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'RECORDING_NOT_FOUND');
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STATE_TRANSITION');
  }
}

export class InvalidOperationError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
  }
}

/**
 * ネットワーク関連エラー（接続失敗・タイムアウト・想定外のHTTPステータス）
 */
export class NetworkError extends DomainError {
  constructor(message: string) {
    super(message, 'NETWORK_ERROR');
  }
}

/**
 * プローブ関連エラー
 */
export class UnprobeableSizeError extends DomainError {
  constructor(message: string) {
    super(message, 'UNPROBEABLE_SIZE');
  }
}

export class ParseError extends DomainError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
  }
}

export class ProbeCancelledError extends DomainError {
  constructor(message: string) {
    super(message, 'PROBE_CANCELLED');
  }
}

/**
 * 録画カタログ（PVRサーバーAPI）関連エラー
 */
export class CatalogError extends DomainError {
  constructor(message: string) {
    super(message, 'CATALOG_ERROR');
  }
}

/**
 * キャッシュストア関連エラー
 */
export class CacheAccessError extends DomainError {
  constructor(message: string) {
    super(message, 'CACHE_ACCESS_ERROR');
  }
}
