/**
 * Minimal Cypher execution surface the Bolt writer needs.
 * Implemented over neo4j-driver; replaced by an in-process fake in tests.
 */
export interface CypherRunner {
  /**
   * Run one query in an auto-commit transaction.
   *
   * @returns Each record as a plain object
   */
  run(
    query: string,
    params?: Record<string, unknown>,
  ): Promise<Record<string, unknown>[]>;

  /** Rejects when the server cannot be reached or refuses the credentials */
  verifyConnectivity(): Promise<void>;

  close(): Promise<void>;
}
