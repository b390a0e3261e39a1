import type { z } from "zod";

import type { ChildLink } from "../children/link.js";
import type { ChildIdentity } from "../children/manifest.js";
import type { StructuredLogger } from "../logger.js";
import type { JsonObject } from "../rpc/messages.js";
import { describeError, settle, type Failure, type Outcome } from "../types.js";

export interface BroadcastRequest<T> {
  readonly method: string;
  readonly params: JsonObject;
  /** Validates each reply; a reply that does not match counts as a failure. */
  readonly resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Tailors the params for one link; `null` skips that link. */
  readonly paramsFor?: (link: ChildLink) => JsonObject | null;
}

export interface BroadcastResponse<T> {
  readonly identity: ChildIdentity;
  readonly name: string;
  readonly value: T;
}

export interface BroadcastFailure {
  readonly identity: ChildIdentity;
  readonly name: string;
  readonly method: string;
  readonly error: Error;
  readonly trace: string;
}

export interface RequestBroadcasterOptions {
  /** Current links, in iteration order. Only ready ones are targeted. */
  readonly links: () => readonly ChildLink[];
  readonly logger: StructuredLogger;
  /** Called once per failed plugin, after logging. */
  readonly onFailure: (failure: BroadcastFailure) => void;
}

/**
 * Correlates one outgoing request with the links it targets and the outcomes
 * collected so far. Outcomes are read back in target order regardless of the
 * order the replies arrived in.
 */
export class PendingBroadcast<T> {
  private readonly outcomes = new Map<ChildIdentity, Outcome<T>>();

  constructor(
    readonly id: number,
    readonly method: string,
    readonly targets: readonly ChildLink[],
  ) {}

  get isComplete(): boolean {
    return this.outcomes.size === this.targets.length;
  }

  record(link: ChildLink, outcome: Outcome<T>): void {
    this.outcomes.set(link.identity, outcome);
  }

  successes(): BroadcastResponse<T>[] {
    const responses: BroadcastResponse<T>[] = [];
    for (const link of this.targets) {
      const outcome = this.outcomes.get(link.identity);
      if (outcome?.ok) {
        responses.push({ identity: link.identity, name: link.name, value: outcome.value });
      }
    }
    return responses;
  }

  failures(): Array<{ link: ChildLink; failure: Failure }> {
    const failed: Array<{ link: ChildLink; failure: Failure }> = [];
    for (const link of this.targets) {
      const outcome = this.outcomes.get(link.identity);
      if (outcome && !outcome.ok) {
        failed.push({ link, failure: outcome });
      }
    }
    return failed;
  }
}

/**
 * Fans a request out to every ready link concurrently. One plugin failing,
 * timing out or answering garbage never affects the others; the broadcast
 * resolves with the successful replies once every outcome is known.
 */
export class RequestBroadcaster {
  private nextId = 1;

  constructor(private readonly options: RequestBroadcasterOptions) {}

  async broadcast<T>(request: BroadcastRequest<T>): Promise<BroadcastResponse<T>[]> {
    const targets: Array<{ link: ChildLink; params: JsonObject }> = [];
    for (const link of this.options.links()) {
      if (!link.isReady) {
        continue;
      }
      const params = request.paramsFor ? request.paramsFor(link) : request.params;
      if (params !== null) {
        targets.push({ link, params });
      }
    }

    const pending = new PendingBroadcast<T>(
      this.nextId++,
      request.method,
      targets.map((target) => target.link),
    );
    if (targets.length === 0) {
      this.options.logger.debug("broadcast_skipped", { method: request.method, broadcast_id: pending.id });
      return [];
    }

    await Promise.all(
      targets.map(async ({ link, params }) => {
        const outcome = await settle(
          link.request(request.method, params).then((raw) => request.resultSchema.parse(raw)),
        );
        pending.record(link, outcome);
      }),
    );

    for (const { link, failure } of pending.failures()) {
      this.reportFailure(pending.method, pending.id, link, failure);
    }
    const responses = pending.successes();
    this.options.logger.debug("broadcast_completed", {
      method: request.method,
      broadcast_id: pending.id,
      targets: targets.length,
      succeeded: responses.length,
    });
    return responses;
  }

  private reportFailure(method: string, broadcastId: number, link: ChildLink, failure: Failure): void {
    this.options.logger.warn("broadcast_failure", {
      child_id: link.identity,
      method,
      broadcast_id: broadcastId,
      message: describeError(failure.error),
    });
    try {
      this.options.onFailure({
        identity: link.identity,
        name: link.name,
        method,
        error: failure.error,
        trace: failure.trace,
      });
    } catch (error) {
      this.options.logger.error("broadcast_failure_report_failed", { message: describeError(error) });
    }
  }
}
