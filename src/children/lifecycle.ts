import type { StructuredLogger } from "../logger.js";
import { canonicalRootsKey, EMPTY_ACTIVE_SET, type ActiveChild, type ActiveChildSet } from "../state/activeChildren.js";
import type { Derived } from "../state/store.js";
import { describeError } from "../types.js";
import type { ChildLink } from "./link.js";
import type { ChildIdentity } from "./manifest.js";

/** Callbacks fired as links change state. Every callback is optional. */
export interface LinkLifecycleListener {
  onReady?(link: ChildLink): void;
  /** Fired once per failed handshake; never for a link disposed mid-handshake. */
  onFailed?(link: ChildLink, error: Error, trace: string): void;
  /** Fired synchronously when a link leaves the active set, before it is torn down. */
  onDisposed?(link: ChildLink): void;
}

export interface LinkLifecycleManagerOptions {
  readonly activeChildren: Derived<ActiveChildSet>;
  readonly createLink: (child: ActiveChild) => ChildLink;
  readonly logger: StructuredLogger;
}

/**
 * Keeps exactly one {@link ChildLink} per active identity. Every change of the
 * derived active set is diffed against the current links: new identities get a
 * link that starts in the background, vanished identities are disposed, and
 * identities present on both sides keep their link.
 */
export class LinkLifecycleManager {
  private readonly entries = new Map<ChildIdentity, ChildLink>();
  private readonly listeners: LinkLifecycleListener[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private unsubscribe: (() => void) | null = null;
  private disposed = false;

  constructor(private readonly options: LinkLifecycleManagerOptions) {}

  /** Subscribes to the active set and reconciles against its current value. */
  start(): void {
    if (this.unsubscribe || this.disposed) {
      return;
    }
    this.unsubscribe = this.options.activeChildren.subscribe((_previous, next) => this.reconcile(next));
    this.reconcile(this.options.activeChildren.value);
  }

  addListener(listener: LinkLifecycleListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /** Every live link, in creation order. */
  links(): ChildLink[] {
    return [...this.entries.values()];
  }

  /** Links that completed their handshake and are not disposed. */
  readyLinks(): ChildLink[] {
    return this.links().filter((link) => link.isReady);
  }

  get(identity: ChildIdentity): ChildLink | undefined {
    return this.entries.get(identity);
  }

  /** Resolves once every pending handshake, roots push and disposal settled. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      await this.whenIdle();
      return;
    }
    this.disposed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.reconcile(EMPTY_ACTIVE_SET);
    await this.whenIdle();
  }

  private reconcile(next: ActiveChildSet): void {
    for (const [identity, link] of [...this.entries]) {
      if (!next.has(identity)) {
        this.entries.delete(identity);
        this.track(this.disposeLink(link));
      }
    }
    if (this.disposed) {
      return;
    }
    for (const [identity, child] of next) {
      const existing = this.entries.get(identity);
      if (existing) {
        if (canonicalRootsKey(existing.roots) !== canonicalRootsKey(child.roots)) {
          this.track(existing.updateRoots(child.roots));
        }
        continue;
      }
      const link = this.options.createLink(child);
      this.entries.set(identity, link);
      this.options.logger.info("link_created", { child_id: identity, name: child.name });
      this.track(this.startLink(link));
    }
  }

  private async startLink(link: ChildLink): Promise<void> {
    const status = await link.start();
    if (link.isDisposed) {
      return;
    }
    if (status.state === "ready") {
      this.emit("onReady", (listener) => listener.onReady?.(link));
    } else if (status.state === "failed") {
      this.emit("onFailed", (listener) => listener.onFailed?.(link, status.error, status.trace));
    }
  }

  private async disposeLink(link: ChildLink): Promise<void> {
    this.emit("onDisposed", (listener) => listener.onDisposed?.(link));
    await link.dispose();
  }

  private track(operation: Promise<void>): void {
    const tracked = operation.catch((error: unknown) => {
      this.options.logger.error("link_lifecycle_failure", { message: describeError(error) });
    });
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
  }

  private emit(event: keyof LinkLifecycleListener, deliver: (listener: LinkLifecycleListener) => void): void {
    for (const listener of [...this.listeners]) {
      try {
        deliver(listener);
      } catch (error) {
        this.options.logger.error("link_listener_failure", { event, message: describeError(error) });
      }
    }
  }
}
