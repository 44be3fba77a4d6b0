/**
 * Typed Proxy Utilities
 *
 * Facade views are Proxies whose traps read and write a graph object. The
 * public type of such a proxy (the facade interface) never matches its
 * target, so the mismatch is accepted in exactly one place: here.
 *
 * @module lib/typed-proxy
 *
 * @example
 * ```typescript
 * const view = createObjectProxy<GraphPlace>({
 *   get(_target, prop) {
 *     return typeof prop === 'string' ? node.get(prop) : undefined
 *   },
 * }, 'GraphPlace')
 * ```
 */

/**
 * Creates a Proxy with correct TypeScript typing for the public interface.
 *
 * @typeParam TPublic - The public interface type (what callers see)
 * @typeParam TTarget - The actual target type (usually simpler)
 * @param debugName - Reported through `Symbol.toStringTag`
 */
export function createTypedProxy<TPublic, TTarget extends object = object>(
  target: TTarget,
  handler: ProxyHandler<TTarget>,
  debugName?: string
): TPublic {
  if (debugName) {
    // Defined on the target so it survives traps that forward symbols
    Object.defineProperty(target, Symbol.toStringTag, {
      value: debugName,
      configurable: true,
    })
  }

  const proxy = new Proxy(target, handler)

  // Type assertion: the handler defines the actual behavior, which implements
  // TPublic. The target is just a placeholder.
  return proxy as unknown as TPublic
}

/**
 * Creates a non-callable object proxy over a fresh, empty target.
 */
export function createObjectProxy<TPublic extends object>(
  handler: ProxyHandler<object>,
  debugName?: string
): TPublic {
  return createTypedProxy<TPublic, object>({}, handler, debugName)
}

/**
 * Property descriptor a proxy reports for a field it computes on access.
 *
 * Always configurable: the target never holds the field, and a proxy may not
 * report a non-configurable property the target lacks.
 */
export function computedDescriptor(value: unknown): PropertyDescriptor {
  return { value, writable: true, enumerable: true, configurable: true }
}

/**
 * Single-point type assertion for a cached proxy.
 *
 * Use this ONLY to hand out a proxy created earlier with `createObjectProxy`
 * under a public type chosen by the caller.
 */
export function asProxyInterface<T>(proxy: object): T {
  return proxy as unknown as T
}
