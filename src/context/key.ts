/**
 * Typed key for request-scoped values.
 *
 * - Keys are identity-based: the key instance is the lookup key, so two keys
 *   created with the same name never collide.
 * - `name` is for developer-facing errors and debugging only.
 * - `defaultValue` is returned by lookups when no scope in the chain binds the key.
 *
 * A key keeps its own bindings, keyed weakly by the scope that holds them.
 */
export class ScopeKey<T> {
  readonly name: string | undefined;
  readonly defaultValue: T | undefined;
  private readonly bindings = new WeakMap<object, { value: T }>();

  constructor(name?: string, defaultValue?: T) {
    this.name = name;
    this.defaultValue = defaultValue;
  }

  /**
   * Attach `value` to `owner`. Called once, by the value scope constructor.
   * @internal
   */
  bindTo(owner: object, value: T): void {
    if (this.bindings.has(owner)) {
      throw new Error(`[Scopeline] Key "${this.label}" is already bound on this scope.`);
    }
    this.bindings.set(owner, { value });
  }

  /**
   * The binding held directly by `owner`, if any.
   * @internal
   */
  readFrom(owner: object): { value: T } | undefined {
    return this.bindings.get(owner);
  }

  get label(): string {
    return this.name || "unnamed";
  }

  toString(): string {
    return `ScopeKey(${this.label})`;
  }
}

/**
 * Create a new key.
 *
 * @example
 * const RequestId = createKey<string>("requestId");
 * const scope = withValue(background(), RequestId, "req-1");
 * scope.value(RequestId); // "req-1", typed as string | undefined
 */
export function createKey<T>(name?: string, defaultValue?: T): ScopeKey<T> {
  return new ScopeKey<T>(name, defaultValue);
}
