export type AnyDisposable = AsyncDisposable | Disposable;

function isAsyncDisposable(target: AnyDisposable): target is AsyncDisposable {
  return Symbol.asyncDispose in target;
}

/** 依序釋放資源；async 與 sync 的 dispose 皆可。 */
export async function dispose(...targets: AnyDisposable[]) {
  for (const target of targets) {
    if (isAsyncDisposable(target)) {
      await target[Symbol.asyncDispose]();
    } else {
      target[Symbol.dispose]();
    }
  }
}
