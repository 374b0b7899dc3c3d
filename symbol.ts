// @filename: symbol.ts
/**
 * Well-known symbols the stream core relies on.
 *
 * Subscriptions, bags and subjects are released through `Symbol.dispose`
 * (and `Symbol.asyncDispose` for `await using`), and every stream exposes
 * itself through `Symbol.observable` so foreign Observable implementations
 * can adopt it. Node.js 20 ships the first two; `Symbol.observable` is
 * installed here when the host does not provide it.
 *
 * @example
 * ```ts
 * import { Symbol } from "./symbol.ts";
 *
 * const foreign = {
 *   [Symbol.observable]() {
 *     return Observable.of(1, 2, 3);
 *   }
 * };
 * ```
 *
 * @module
 */

declare global {
  interface SymbolConstructor {
    /**
     * Interop symbol from the TC39 Observable proposal. Objects carrying a
     * `[Symbol.observable]()` method can be handed to `Observable.from()`.
     *
     * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
     */
    readonly observable: unique symbol;
  }
}

/** The host `Symbol` constructor, with the interop symbols guaranteed to exist. */
export const Symbol: SymbolConstructor = globalThis.Symbol;

function install(name: "dispose" | "asyncDispose" | "observable"): void {
  if (typeof Reflect.get(Symbol, name) === "symbol") return;

  Reflect.defineProperty(Symbol, name, {
    value: Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

install("dispose");
install("asyncDispose");
install("observable");
