import neo4j from "neo4j-driver";
import type { CypherRunner } from "./CypherRunner.js";

export interface Neo4jConnectionOptions {
  uri: string;
  username: string;
  password: string;
  /** Target database (default: the server's default database) */
  database?: string;
}

/**
 * CypherRunner over a neo4j-driver connection pool. Works against Neo4j and
 * Memgraph alike.
 */
export const createNeo4jRunner = (
  options: Neo4jConnectionOptions,
): CypherRunner => {
  const driver = neo4j.driver(
    options.uri,
    neo4j.auth.basic(options.username, options.password),
  );

  return {
    async run(query, params = {}) {
      const session = driver.session({ database: options.database });
      try {
        const result = await session.run(query, params);
        return result.records.map((record) => record.toObject());
      } finally {
        await session.close();
      }
    },

    async verifyConnectivity() {
      await driver.verifyConnectivity();
    },

    async close() {
      await driver.close();
    },
  };
};
