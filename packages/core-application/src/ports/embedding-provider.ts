export type EmbeddingVector = number[];

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
}
