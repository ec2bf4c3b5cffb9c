export type ProjectId = string;

/** Lowercase hex SHA-256. */
export type Digest = string;

export type ChunkHash = Digest;

/** Relative path inside a project, always with `/` separators. */
export type RelativePath = string;
