import type { ChildLink } from "../children/link.js";
import type { ChildIdentity } from "../children/manifest.js";
import type { MessageQueue } from "../events/stream.js";
import type { StructuredLogger } from "../logger.js";
import { NOTIFICATIONS, type Diagnostic } from "../protocol/schemas.js";
import type { JsonObject } from "../rpc/messages.js";
import { describeError, normaliseErrorMessage } from "../types.js";
import { DiagnosticsAggregator } from "./diagnostics.js";

/** Sends one notification to the host. */
export type HostNotifier = (method: string, params: JsonObject) => void;

/** Payload of the `plugin/error` notification sent to the host. */
export interface PluginErrorReport {
  readonly identity: ChildIdentity;
  readonly name: string;
  readonly message: string;
  readonly stackTrace: string;
}

export interface NotificationRelayOptions {
  readonly notify: HostNotifier;
  readonly logger: StructuredLogger;
  /** Current link order, used to union diagnostics. */
  readonly order: () => readonly ChildIdentity[];
}

/**
 * Forwards what plugins say on their own to the host. Each attached link gets
 * four dispatch loops, one per queue, which end when the link is disposed.
 */
export class NotificationRelay {
  readonly diagnostics: DiagnosticsAggregator;

  private readonly attached = new Set<ChildIdentity>();
  private readonly loops = new Map<ChildIdentity, Promise<void>>();

  constructor(private readonly options: NotificationRelayOptions) {
    this.diagnostics = new DiagnosticsAggregator({
      order: options.order,
      emit: (file, diagnostics) => this.emitDiagnostics(file, diagnostics),
    });
  }

  isAttached(identity: ChildIdentity): boolean {
    return this.attached.has(identity);
  }

  attach(link: ChildLink): void {
    if (this.attached.has(link.identity)) {
      return;
    }
    this.attached.add(link.identity);
    const loops = Promise.all([
      this.drain(link, "diagnostics", link.diagnostics, (event) => {
        this.diagnostics.update(link.identity, event.file, event.diagnostics);
      }),
      this.drain(link, "prints", link.prints, (message) => this.forwardPrint(link, message)),
      this.drain(link, "internal_errors", link.internalErrors, (event) => {
        this.reportPluginError({ identity: link.identity, name: link.name, ...event });
      }),
      this.drain(link, "notifications", link.notifications, (event) => {
        this.options.notify(event.method, event.params);
      }),
    ]).then(() => undefined);
    this.loops.set(link.identity, loops);
    void loops.finally(() => {
      if (this.loops.get(link.identity) === loops) {
        this.loops.delete(link.identity);
      }
    });
  }

  /** Stops relaying a link and withdraws its diagnostics. */
  detach(link: ChildLink): void {
    if (!this.attached.delete(link.identity)) {
      return;
    }
    const republished = this.diagnostics.remove(link.identity);
    this.options.logger.debug("relay_detached", { child_id: link.identity, republished_files: republished.length });
  }

  reportPluginError(report: PluginErrorReport): void {
    const message = normaliseErrorMessage(report.message);
    this.options.logger.warn("plugin_error", { child_id: report.identity, message });
    this.options.notify(NOTIFICATIONS.pluginError, {
      identity: report.identity,
      name: report.name,
      isFatal: false,
      message,
      stackTrace: report.stackTrace,
    });
  }

  /** Resolves once the loops of every disposed link have ended. */
  async idle(): Promise<void> {
    await Promise.all([...this.loops.values()]);
  }

  private async drain<T>(
    link: ChildLink,
    kind: string,
    queue: MessageQueue<T>,
    handle: (event: T) => void,
  ): Promise<void> {
    for await (const event of queue) {
      if (!this.attached.has(link.identity)) {
        continue;
      }
      try {
        handle(event);
      } catch (error) {
        this.options.logger.error("relay_event_failed", { child_id: link.identity, kind, message: describeError(error) });
      }
    }
  }

  private forwardPrint(link: ChildLink, message: string): void {
    this.options.logger.info("plugin_print", { child_id: link.identity, message });
    this.options.notify(NOTIFICATIONS.print, { message: labelLines(link.name, message) });
  }

  private emitDiagnostics(file: string, diagnostics: Diagnostic[]): void {
    this.options.notify(NOTIFICATIONS.diagnosticsChanged, { file, diagnostics });
  }
}

/** Prefixes every line with `[name]`; an empty line becomes `[name]` alone. */
export function labelLines(name: string, message: string): string {
  return message
    .split("\n")
    .map((line) => (line.length === 0 ? `[${name}]` : `[${name}] ${line}`))
    .join("\n");
}
