export type DatabaseConnection =
  | { type: 'postgres'; url: string; ssl: boolean }
  | { type: 'sqlite'; database: string };

/**
 * Picks the durable backend from the environment. `null` means nothing is
 * configured and the in-memory fallback serves requests.
 */
export function resolveDatabaseConnection(
  env: Record<string, string | undefined>,
): DatabaseConnection | null {
  const databaseUrl = env.DATABASE_URL?.trim();
  if (databaseUrl) {
    return {
      type: 'postgres',
      url: databaseUrl,
      ssl: env.DATABASE_SSL?.trim().toLowerCase() === 'true',
    };
  }

  const databasePath = env.DATABASE_PATH?.trim();
  if (databasePath) {
    return { type: 'sqlite', database: databasePath };
  }

  return null;
}
