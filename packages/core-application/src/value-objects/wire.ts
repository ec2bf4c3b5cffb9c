import { z } from "zod";
import type { SerializedNode } from "@code-sync/core-domain";

// ──────────────────────────────────────────────────
// Shared pieces
// ──────────────────────────────────────────────────

export const DigestSchema = z.string().regex(/^[0-9a-f]{64}$/, "expected a lowercase hex sha256");

export const ProjectIdSchema = z.string().min(1).max(512);

export const RelativePathSchema = z
  .string()
  .min(1)
  .refine(
    (p) => !p.startsWith("/") && p.split("/").every((s) => s !== "" && s !== "." && s !== ".."),
    "expected a relative posix path"
  );

export const SerializedNodeSchema: z.ZodType<SerializedNode> = z.lazy(() =>
  z.object({
    name: z.string(),
    kind: z.enum(["file", "directory"]),
    hash: DigestSchema,
    size: z.number().int().nonnegative().optional(),
    mtimeMs: z.number().nonnegative().optional(),
    children: z.array(SerializedNodeSchema).optional(),
  })
);

export const SerializedTreeSchema = z.object({
  version: z.literal(1),
  rootHash: DigestSchema,
  root: SerializedNodeSchema,
});

export const ChangeSetSchema = z.object({
  added: z.array(RelativePathSchema),
  modified: z.array(RelativePathSchema),
  removed: z.array(RelativePathSchema),
});

export const RejectionReasonSchema = z.enum([
  "HashMismatch",
  "NotInChangeSet",
  "ContentUnavailable",
  "EmbeddingProviderError",
]);

export const EmbeddingRecordSchema = z.object({
  chunkHash: DigestSchema,
  encryptedVector: z.string().min(1),
  nonce: z.string().min(1),
  keyId: z.string().min(1),
});

/** Persisted form of a TreeSnapshot; the tree itself is re-verified on load. */
export const TreeSnapshotSchema = z.object({
  projectId: ProjectIdSchema,
  rootHash: DigestSchema,
  createdAtMs: z.number().nonnegative(),
  tree: SerializedTreeSchema,
  chunkHashesByPath: z.record(z.array(DigestSchema)),
});

// ──────────────────────────────────────────────────
// probe
// ──────────────────────────────────────────────────

export const ProbeRequestSchema = z.object({
  projectId: ProjectIdSchema,
  rootHash: DigestSchema,
});
export type ProbeRequest = z.infer<typeof ProbeRequestSchema>;

export const ProbeResponseSchema = z.object({
  upToDate: z.boolean(),
  acknowledgedRootHash: DigestSchema.nullable(),
});
export type ProbeResponse = z.infer<typeof ProbeResponseSchema>;

// ──────────────────────────────────────────────────
// negotiate
// ──────────────────────────────────────────────────

export const NegotiateRequestSchema = z.object({
  projectId: ProjectIdSchema,
  tree: SerializedTreeSchema,
});
export type NegotiateRequest = z.infer<typeof NegotiateRequestSchema>;

export const NegotiateResponseSchema = z.object({
  changedPaths: z.array(RelativePathSchema),
  removedPaths: z.array(RelativePathSchema),
  changeSet: ChangeSetSchema,
  committed: z.boolean(),
  acknowledgedRootHash: DigestSchema.nullable(),
});
export type NegotiateResponse = z.infer<typeof NegotiateResponseSchema>;

// ──────────────────────────────────────────────────
// pushChanges
// ──────────────────────────────────────────────────

export const FilePayloadSchema = z.object({
  path: RelativePathSchema,
  /** base64; null when the client could not read the file. */
  content: z.string().nullable(),
  claimedHash: DigestSchema,
});
export type FilePayload = z.infer<typeof FilePayloadSchema>;

export const PushChangesRequestSchema = z.object({
  projectId: ProjectIdSchema,
  files: z.array(FilePayloadSchema),
});
export type PushChangesRequest = z.infer<typeof PushChangesRequestSchema>;

export const PushChangesResponseSchema = z.object({
  accepted: z.array(RelativePathSchema),
  rejected: z.array(z.object({ path: z.string(), reason: RejectionReasonSchema })),
  /** Non-fatal notes on accepted files, such as chunks over the size budget. */
  warnings: z.array(z.string()),
  committed: z.boolean(),
  acknowledgedRootHash: DigestSchema.nullable(),
});
export type PushChangesResponse = z.infer<typeof PushChangesResponseSchema>;

// ──────────────────────────────────────────────────
// pushRemovals
// ──────────────────────────────────────────────────

export const PushRemovalsRequestSchema = z.object({
  projectId: ProjectIdSchema,
  paths: z.array(RelativePathSchema),
});
export type PushRemovalsRequest = z.infer<typeof PushRemovalsRequestSchema>;

export const PushRemovalsResponseSchema = z.object({
  ack: z.boolean(),
  committed: z.boolean(),
  acknowledgedRootHash: DigestSchema.nullable(),
});
export type PushRemovalsResponse = z.infer<typeof PushRemovalsResponseSchema>;

// ──────────────────────────────────────────────────
// health / projects
// ──────────────────────────────────────────────────

export const HealthResponseSchema = z.object({
  status: z.literal("healthy"),
  projectsCount: z.number().int().nonnegative(),
  uptimeMs: z.number().nonnegative(),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const ProjectInfoSchema = z.object({
  projectId: ProjectIdSchema,
  rootHash: DigestSchema,
  fileCount: z.number().int().nonnegative(),
  acknowledgedAtIso: z.string(),
});
export type ProjectInfo = z.infer<typeof ProjectInfoSchema>;

export const ProjectsResponseSchema = z.object({
  projects: z.array(ProjectInfoSchema),
});
export type ProjectsResponse = z.infer<typeof ProjectsResponseSchema>;

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
