/**
 * Synchronous reactive store. Inputs are written wholesale by the host
 * handlers; derived values are recomputed as soon as one of their inputs
 * changes and subscribers are notified once every recomputation completed.
 *
 * Subscribers run in the order they registered across the whole store, not
 * per value, so a listener registered first always observes a change first.
 */

export type StateListener<T> = (previous: T, current: T) => void | Promise<void>;

/** Context passed to {@link StateStoreOptions.onListenerError}. */
export interface ListenerErrorContext {
  /** Name of the input or derived value whose change was being delivered. */
  readonly node: string;
}

export interface StateStoreOptions {
  /** Receives the errors thrown (or rejected) by subscribers. */
  readonly onListenerError?: (error: unknown, context: ListenerErrorContext) => void;
}

export class StoreDisposedError extends Error {
  constructor(operation: string) {
    super(`cannot ${operation}: state store disposed`);
    this.name = "StoreDisposedError";
  }
}

interface Subscription {
  readonly node: string;
  readonly deliver: () => void | Promise<void>;
}

/** Read side of a derived value. */
export interface Derived<T> {
  readonly name: string;
  readonly value: T;
  subscribe(listener: StateListener<T>): () => void;
}

interface DerivedNode<I> {
  readonly name: string;
  readonly deps: ReadonlySet<keyof I>;
  /** Returns `true` when the recomputed value replaced the previous one. */
  readonly recompute: (inputs: Readonly<I>) => boolean;
}

export class StateStore<I extends object> {
  private readonly values: I;
  private readonly previousValues: I;
  private readonly derived: DerivedNode<I>[] = [];
  private readonly nodeNames = new Set<string>();
  private subscriptions: Subscription[] = [];
  private disposed = false;
  private readonly onListenerError?: (error: unknown, context: ListenerErrorContext) => void;

  constructor(initial: I, options: StateStoreOptions = {}) {
    this.values = { ...initial };
    this.previousValues = { ...initial };
    this.onListenerError = options.onListenerError;
    for (const key of Object.keys(initial)) {
      this.nodeNames.add(key);
    }
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get<K extends keyof I>(name: K): I[K] {
    return this.values[name];
  }

  /**
   * Overwrites an input. A value shallowly equal to the current one is
   * ignored; otherwise dependent derived values are recomputed before any
   * subscriber runs.
   */
  setInput<K extends keyof I>(name: K, value: I[K]): void {
    if (this.disposed) {
      throw new StoreDisposedError(`set input ${String(name)}`);
    }
    const previous = this.values[name];
    if (shallowEqual(previous, value)) {
      return;
    }
    this.previousValues[name] = previous;
    this.values[name] = value;

    const changed = new Set<string>([String(name)]);
    for (const node of this.derived) {
      if (node.deps.has(name) && node.recompute(this.values)) {
        changed.add(node.name);
      }
    }
    this.notify(changed);
  }

  subscribe<K extends keyof I>(name: K, listener: StateListener<I[K]>): () => void {
    return this.addSubscription(String(name), () => listener(this.previousValues[name], this.values[name]));
  }

  /**
   * Registers a value computed from the listed inputs. `compute` must be pure;
   * it runs once immediately and again whenever a dependency changes.
   */
  derive<T>(name: string, deps: readonly (keyof I)[], compute: (inputs: Readonly<I>) => T): Derived<T> {
    if (this.disposed) {
      throw new StoreDisposedError(`derive ${name}`);
    }
    if (this.nodeNames.has(name)) {
      throw new Error(`state node ${name} is already registered`);
    }
    this.nodeNames.add(name);
    let current = compute(this.values);
    let previous = current;
    this.derived.push({
      name,
      deps: new Set(deps),
      recompute: (inputs) => {
        const next = compute(inputs);
        if (shallowEqual(current, next)) {
          return false;
        }
        previous = current;
        current = next;
        return true;
      },
    });

    const addSubscription = (deliver: () => void | Promise<void>) => this.addSubscription(name, deliver);
    return {
      name,
      get value(): T {
        return current;
      },
      subscribe(listener: StateListener<T>): () => void {
        return addSubscription(() => listener(previous, current));
      },
    };
  }

  /** Drops every subscriber. Later writes throw {@link StoreDisposedError}. */
  dispose(): void {
    this.disposed = true;
    this.subscriptions = [];
  }

  private addSubscription(node: string, deliver: () => void | Promise<void>): () => void {
    if (this.disposed) {
      throw new StoreDisposedError(`subscribe to ${node}`);
    }
    const subscription: Subscription = { node, deliver };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((entry) => entry !== subscription);
    };
  }

  private notify(changed: ReadonlySet<string>): void {
    // Snapshot: listeners added or removed during delivery take effect next time.
    const targets = this.subscriptions.filter((subscription) => changed.has(subscription.node));
    for (const subscription of targets) {
      try {
        const result = subscription.deliver();
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportListenerError(error, subscription.node));
        }
      } catch (error) {
        this.reportListenerError(error, subscription.node);
      }
    }
  }

  private reportListenerError(error: unknown, node: string): void {
    this.onListenerError?.(error, { node });
  }
}

/**
 * Identity, or same-length arrays / same-key plain objects / same-size maps
 * whose members are identical.
 */
export function shallowEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) {
    return true;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((value, index) => Object.is(value, right[index]));
  }
  if (left instanceof Map && right instanceof Map) {
    if (left.size !== right.size) {
      return false;
    }
    for (const [key, value] of left) {
      if (!right.has(key) || !Object.is(right.get(key), value)) {
        return false;
      }
    }
    return true;
  }
  if (isPlainObject(left) && isPlainObject(right)) {
    const leftKeys = Object.keys(left);
    const rightKeys = Object.keys(right);
    return (
      leftKeys.length === rightKeys.length &&
      leftKeys.every((key) => Object.prototype.hasOwnProperty.call(right, key) && Object.is(left[key], right[key]))
    );
  }
  return false;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
