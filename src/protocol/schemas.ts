import { z } from "zod";

/**
 * Wire schemas shared by the host-facing and plugin-facing sides of the hub.
 * Both sides use the same method names; the hub validates host params before
 * dispatching and validates every plugin reply before merging it.
 */

/** Object whose content is opaque to the hub and forwarded as-is. */
export const OpaqueObjectSchema = z.object({}).passthrough();

const FilePathSchema = z.string().trim().min(1, "file paths must be non-empty");
const OffsetSchema = z.number().int().nonnegative();

export const WorkspaceRootSchema = z
  .object({
    root: FilePathSchema,
    exclude: z.array(FilePathSchema).default([]),
    optionsFile: FilePathSchema.nullable().optional(),
  })
  .strict();
export type WorkspaceRoot = z.infer<typeof WorkspaceRootSchema>;

export const DiagnosticSchema = z
  .object({
    severity: z.enum(["info", "warning", "error"]),
    code: z.string(),
    message: z.string(),
    location: z
      .object({
        file: FilePathSchema,
        offset: OffsetSchema,
        length: OffsetSchema,
        startLine: z.number().int().optional(),
        startColumn: z.number().int().optional(),
      })
      .passthrough(),
    correction: z.string().nullable().optional(),
  })
  .passthrough();
export type Diagnostic = z.infer<typeof DiagnosticSchema>;

export const FileDiagnosticsSchema = z.object({
  file: FilePathSchema,
  diagnostics: z.array(DiagnosticSchema),
});
export type FileDiagnostics = z.infer<typeof FileDiagnosticsSchema>;

const ContentChangeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("add"), content: z.string() }).strict(),
  z
    .object({
      type: z.literal("change"),
      edits: z.array(z.object({ offset: OffsetSchema, length: OffsetSchema, replacement: z.string() }).strict()),
    })
    .strict(),
  z.object({ type: z.literal("remove") }).strict(),
]);
export type ContentChange = z.infer<typeof ContentChangeSchema>;

const FileRangeShape = { file: FilePathSchema, offset: OffsetSchema, length: OffsetSchema };

export const SetRootsParamsSchema = z.object({ roots: z.array(WorkspaceRootSchema) }).strict();
export const SetPriorityFilesParamsSchema = z.object({ files: z.array(FilePathSchema) }).strict();
export const SetSubscriptionsParamsSchema = z
  .object({ subscriptions: z.record(z.array(FilePathSchema)) })
  .strict();
export const UpdateContentParamsSchema = z.object({ files: z.record(ContentChangeSchema) }).strict();
export const HandleWatchEventsParamsSchema = z
  .object({
    events: z.array(z.object({ type: z.enum(["add", "modify", "remove"]), path: FilePathSchema }).strict()),
  })
  .strict();
export const GetDiagnosticsParamsSchema = z.object({ files: z.array(FilePathSchema) }).strict();
export const GetFixesParamsSchema = z.object({ file: FilePathSchema, offset: OffsetSchema }).strict();
export const GetAssistsParamsSchema = z.object(FileRangeShape).strict();
export const GetAvailableRefactoringsParamsSchema = z.object(FileRangeShape).strict();
export const GetRefactoringParamsSchema = z
  .object({
    ...FileRangeShape,
    kind: z.string().trim().min(1),
    validateOnly: z.boolean().default(false),
    options: OpaqueObjectSchema.optional(),
  })
  .strict();
export const GetNavigationParamsSchema = z.object(FileRangeShape).strict();
export const GetCompletionParamsSchema = z.object({ file: FilePathSchema, offset: OffsetSchema }).strict();
export const VersionCheckParamsSchema = z
  .object({
    version: z.string().trim().min(1),
    byteStorePath: z.string().optional(),
    sdkPath: z.string().optional(),
  })
  .passthrough();
export const GetKytheEntriesParamsSchema = z.object({ file: FilePathSchema }).strict();
export const ShutdownParamsSchema = z.object({}).strict();

export type UpdateContentParams = z.infer<typeof UpdateContentParamsSchema>;
export type VersionCheckParams = z.infer<typeof VersionCheckParamsSchema>;

/**
 * Closed union of the requests the host may send. Parsing through this schema
 * is the only way a raw message becomes a {@link HostRequest}.
 */
export const HostRequestSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("roots/set"), params: SetRootsParamsSchema }),
  z.object({ method: z.literal("priorityFiles/set"), params: SetPriorityFilesParamsSchema }),
  z.object({ method: z.literal("subscriptions/set"), params: SetSubscriptionsParamsSchema }),
  z.object({ method: z.literal("content/update"), params: UpdateContentParamsSchema }),
  z.object({ method: z.literal("watchEvents/handle"), params: HandleWatchEventsParamsSchema }),
  z.object({ method: z.literal("diagnostics/get"), params: GetDiagnosticsParamsSchema }),
  z.object({ method: z.literal("fixes/get"), params: GetFixesParamsSchema }),
  z.object({ method: z.literal("assists/get"), params: GetAssistsParamsSchema }),
  z.object({ method: z.literal("refactorings/available"), params: GetAvailableRefactoringsParamsSchema }),
  z.object({ method: z.literal("refactoring/get"), params: GetRefactoringParamsSchema }),
  z.object({ method: z.literal("navigation/get"), params: GetNavigationParamsSchema }),
  z.object({ method: z.literal("completion/get"), params: GetCompletionParamsSchema }),
  z.object({ method: z.literal("version/check"), params: VersionCheckParamsSchema }),
  z.object({ method: z.literal("kytheEntries/get"), params: GetKytheEntriesParamsSchema }),
  z.object({ method: z.literal("shutdown"), params: ShutdownParamsSchema }),
]);
export type HostRequest = z.infer<typeof HostRequestSchema>;
export type HostMethod = HostRequest["method"];

const HOST_METHODS: readonly HostMethod[] = HostRequestSchema.options.map(
  (option) => option.shape.method.value,
);

export function isHostMethod(method: string): method is HostMethod {
  return HOST_METHODS.some((candidate) => candidate === method);
}

// Plugin replies.

export const EmptyResultSchema = OpaqueObjectSchema;
export const DiagnosticsResultSchema = z.object({ diagnostics: z.array(FileDiagnosticsSchema) }).passthrough();
export const FixesResultSchema = z.object({ fixes: z.array(OpaqueObjectSchema) }).passthrough();
export const AssistsResultSchema = z.object({ assists: z.array(OpaqueObjectSchema) }).passthrough();
export const AvailableRefactoringsResultSchema = z.object({ kinds: z.array(z.string()) }).passthrough();
export const RefactoringResultSchema = z.object({ refactoring: OpaqueObjectSchema.nullable() }).passthrough();

export const NavigationTargetSchema = z
  .object({ kind: z.string(), fileIndex: z.number().int().nonnegative(), offset: OffsetSchema, length: OffsetSchema })
  .passthrough();
export const NavigationRegionSchema = z
  .object({ offset: OffsetSchema, length: OffsetSchema, targets: z.array(z.number().int().nonnegative()) })
  .passthrough();
export const NavigationResultSchema = z
  .object({
    files: z.array(FilePathSchema),
    targets: z.array(NavigationTargetSchema),
    regions: z.array(NavigationRegionSchema),
  })
  .passthrough()
  .superRefine((value, ctx) => {
    value.targets.forEach((target, index) => {
      if (target.fileIndex >= value.files.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["targets", index, "fileIndex"], message: "file index out of range" });
      }
    });
    value.regions.forEach((region, index) => {
      if (region.targets.some((target) => target >= value.targets.length)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["regions", index, "targets"], message: "target index out of range" });
      }
    });
  });
export const CompletionResultSchema = z
  .object({
    replacementOffset: z.number().int(),
    replacementLength: z.number().int(),
    suggestions: z.array(OpaqueObjectSchema),
  })
  .passthrough();
export const HandshakeResultSchema = z
  .object({
    isCompatible: z.boolean().optional(),
    name: z.string(),
    version: z.string(),
    contactInfo: z.string().optional(),
    interestingFiles: z.array(z.string()).optional(),
  })
  .passthrough();

export type EmptyResult = z.infer<typeof EmptyResultSchema>;
export type DiagnosticsResult = z.infer<typeof DiagnosticsResultSchema>;
export type FixesResult = z.infer<typeof FixesResultSchema>;
export type AssistsResult = z.infer<typeof AssistsResultSchema>;
export type AvailableRefactoringsResult = z.infer<typeof AvailableRefactoringsResultSchema>;
export type RefactoringResult = z.infer<typeof RefactoringResultSchema>;
export type NavigationTarget = z.infer<typeof NavigationTargetSchema>;
export type NavigationRegion = z.infer<typeof NavigationRegionSchema>;
export type NavigationResult = z.infer<typeof NavigationResultSchema>;
export type CompletionResult = z.infer<typeof CompletionResultSchema>;
export type HandshakeResult = z.infer<typeof HandshakeResultSchema>;

export interface VersionCheckResult {
  [key: string]: unknown;
  isCompatible: boolean;
  name: string;
  version: string;
  contactInfo: string;
  interestingFiles: string[];
}

/** Result type returned to the host for every request kind. */
export interface HostResults {
  "roots/set": EmptyResult;
  "priorityFiles/set": EmptyResult;
  "subscriptions/set": EmptyResult;
  "content/update": EmptyResult;
  "watchEvents/handle": EmptyResult;
  "diagnostics/get": DiagnosticsResult;
  "fixes/get": FixesResult;
  "assists/get": AssistsResult;
  "refactorings/available": AvailableRefactoringsResult;
  "refactoring/get": RefactoringResult;
  "navigation/get": NavigationResult;
  "completion/get": CompletionResult;
  "version/check": VersionCheckResult;
  "kytheEntries/get": EmptyResult;
  shutdown: EmptyResult;
}

// Notifications.

export const NOTIFICATIONS = {
  diagnosticsChanged: "diagnostics/changed",
  print: "log/print",
  pluginError: "plugin/error",
} as const;

export const DiagnosticsChangedParamsSchema = FileDiagnosticsSchema;
export const PrintParamsSchema = z.object({ message: z.string() }).passthrough();
export const ChildPluginErrorParamsSchema = z
  .object({
    message: z.string(),
    stackTrace: z.string().optional(),
    isFatal: z.boolean().optional(),
  })
  .passthrough();

