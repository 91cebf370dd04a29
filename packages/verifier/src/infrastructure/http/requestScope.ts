/**
 * 1リクエスト分の AbortSignal
 *
 * タイムアウトと呼び出し元のキャンセルのどちらでも中断される。
 * 終わったら dispose() でタイマーとリスナーを外す。
 */
export interface RequestScope {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

export function createRequestScope(timeoutMs: number, parent?: AbortSignal): RequestScope {
  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
