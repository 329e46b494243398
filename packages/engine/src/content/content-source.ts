/**
 * Provider of the bytes served for a normalized request path.
 *
 * `lookup` resolves with null when nothing is stored under the path and
 * rejects only on an unexpected fault. Implementations are read-only, so
 * concurrent lookups from different connections need no coordination.
 */
export interface ContentSource {
  lookup(path: string): Promise<Uint8Array | null>;
}
