import type { ChildLink } from "../children/link.js";
import { compareVersions, InvalidVersionError } from "../children/version.js";
import type { StructuredLogger } from "../logger.js";
import {
  AssistsResultSchema,
  AvailableRefactoringsResultSchema,
  CompletionResultSchema,
  DiagnosticsResultSchema,
  EmptyResultSchema,
  FixesResultSchema,
  NavigationResultSchema,
  RefactoringResultSchema,
  type ContentChange,
  type EmptyResult,
  type HostRequest,
  type HostResults,
  type UpdateContentParams,
  type VersionCheckParams,
  type VersionCheckResult,
  type WorkspaceRoot,
} from "../protocol/schemas.js";
import type { JsonObject } from "../rpc/messages.js";
import { HUB_CONTACT, HUB_NAME, HUB_VERSION } from "../serverOptions.js";
import { isFileInRoot } from "../state/activeChildren.js";
import type { StateStore } from "../state/store.js";
import type { RequestBroadcaster } from "./broadcaster.js";
import {
  mergeAssists,
  mergeAvailableRefactorings,
  mergeCompletion,
  mergeDiagnostics,
  mergeFixes,
  mergeNavigation,
  mergeRefactoring,
} from "./merge.js";

/** Inputs of the hub's state store, written by the handlers below. */
export interface HubInputs {
  roots: readonly WorkspaceRoot[];
  priorityFiles: readonly string[];
  subscriptions: Readonly<Record<string, readonly string[]>>;
  versionCheck: VersionCheckParams | null;
}

export const INITIAL_HUB_INPUTS: HubInputs = {
  roots: [],
  priorityFiles: [],
  subscriptions: {},
  versionCheck: null,
};

export interface HandlerContext {
  readonly store: StateStore<HubInputs>;
  readonly broadcaster: RequestBroadcaster;
  readonly links: () => readonly ChildLink[];
  readonly minHostVersion: string;
  readonly logger: StructuredLogger;
}

/** Result of every host request, keyed by its method. */
export type HostResult = HostResults[HostRequest["method"]];

/** Runs the handler matching the request kind. */
export async function dispatchHostRequest(request: HostRequest, context: HandlerContext): Promise<HostResult> {
  switch (request.method) {
    case "roots/set":
      context.store.setInput("roots", request.params.roots);
      return {};
    case "priorityFiles/set":
      context.store.setInput("priorityFiles", request.params.files);
      return forward(context, request.method, request.params);
    case "subscriptions/set":
      context.store.setInput("subscriptions", request.params.subscriptions);
      return forward(context, request.method, request.params);
    case "content/update":
      return updateContent(context, request.params);
    case "watchEvents/handle":
      return forward(context, request.method, request.params);
    case "diagnostics/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: DiagnosticsResultSchema,
      });
      return mergeDiagnostics(responses.map((response) => response.value));
    }
    case "fixes/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: FixesResultSchema,
      });
      return mergeFixes(responses.map((response) => response.value));
    }
    case "assists/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: AssistsResultSchema,
      });
      return mergeAssists(responses.map((response) => response.value));
    }
    case "refactorings/available": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: AvailableRefactoringsResultSchema,
      });
      return mergeAvailableRefactorings(responses.map((response) => response.value));
    }
    case "refactoring/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: RefactoringResultSchema,
      });
      return mergeRefactoring(responses.map((response) => response.value));
    }
    case "navigation/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: NavigationResultSchema,
      });
      return mergeNavigation(responses.map((response) => response.value));
    }
    case "completion/get": {
      const responses = await context.broadcaster.broadcast({
        method: request.method,
        params: request.params,
        resultSchema: CompletionResultSchema,
      });
      return mergeCompletion(responses.map((response) => response.value));
    }
    case "version/check":
      return checkVersion(context, request.params);
    case "kytheEntries/get":
      // Plugins build their index entries on request; the hub has nothing to merge.
      return forward(context, request.method, request.params);
    case "shutdown":
      return forward(context, request.method, request.params);
    default:
      return assertNever(request);
  }
}

/** Commands whose replies carry nothing: awaited only so failures get reported. */
async function forward(context: HandlerContext, method: string, params: JsonObject): Promise<EmptyResult> {
  await context.broadcaster.broadcast({ method, params, resultSchema: EmptyResultSchema });
  return {};
}

/**
 * Each plugin only hears about files inside its roots and outside their
 * exclusions; a plugin left with no file is not contacted.
 */
async function updateContent(context: HandlerContext, params: UpdateContentParams): Promise<EmptyResult> {
  const entries = Object.entries(params.files);
  await context.broadcaster.broadcast({
    method: "content/update",
    params,
    resultSchema: EmptyResultSchema,
    paramsFor: (link) => {
      const relevant = filterFilesForRoots(entries, link.roots);
      return relevant.length === 0 ? null : { files: Object.fromEntries(relevant) };
    },
  });
  return {};
}

export function filterFilesForRoots(
  entries: ReadonlyArray<[string, ContentChange]>,
  roots: readonly WorkspaceRoot[],
): Array<[string, ContentChange]> {
  return entries.filter(([file]) => roots.some((root) => isFileInRoot(file, root)));
}

function checkVersion(context: HandlerContext, params: VersionCheckParams): VersionCheckResult {
  context.store.setInput("versionCheck", params);
  const interestingFiles = new Set<string>();
  for (const link of context.links()) {
    const status = link.status;
    if (link.isReady && status.state === "ready") {
      for (const pattern of status.handshake.interestingFiles ?? []) {
        interestingFiles.add(pattern);
      }
    }
  }
  return {
    isCompatible: isHostSupported(params.version, context.minHostVersion, context.logger),
    name: HUB_NAME,
    version: HUB_VERSION,
    contactInfo: HUB_CONTACT,
    interestingFiles: [...interestingFiles],
  };
}

function isHostSupported(hostVersion: string, minHostVersion: string, logger: StructuredLogger): boolean {
  try {
    return compareVersions(hostVersion, minHostVersion) >= 0;
  } catch (error) {
    if (error instanceof InvalidVersionError) {
      logger.warn("host_version_invalid", { version: hostVersion });
      return false;
    }
    throw error;
  }
}

function assertNever(value: never): never {
  throw new Error(`unhandled host request ${JSON.stringify(value)}`);
}
