/**
 * 釋放資源，同時支援同步與非同步的 dispose 介面。
 */
export async function dispose(
  target: Partial<AsyncDisposable & Disposable> | null | undefined
) {
  if (!target) return;
  if (typeof target[Symbol.asyncDispose] === "function") {
    await target[Symbol.asyncDispose]();
    return;
  }
  if (typeof target[Symbol.dispose] === "function") {
    target[Symbol.dispose]();
  }
}
