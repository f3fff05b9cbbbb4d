/**
 * 釋放資源；同時支援同步與非同步的 dispose。
 */
export async function dispose(
  target: Partial<AsyncDisposable & Disposable>
): Promise<void> {
  const asyncDispose = target[Symbol.asyncDispose];
  if (asyncDispose) {
    await asyncDispose.call(target);
    return;
  }
  target[Symbol.dispose]?.call(target);
}
