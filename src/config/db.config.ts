/**
 * Database Configuration
 *
 * Connection credentials for the SQL client, read from the environment.
 * A `.env` file in the working directory is loaded first (dotenv), so
 * local development needs no exported variables.
 */

import "dotenv/config";
import { ConfigurationError } from "../core/errors";
import { ConfigurationSettings } from "./ConfigurationSettings";

/**
 * Credentials a SqlClient connects with
 */
export interface SqlCredentials {
  hostname: string;
  port: number;
  username: string;
  password: string;
  database: string;
  /** Client character set, sent as the session's client_encoding */
  charset: string;
}

/**
 * Build credentials from an environment map
 *
 * Variables: DB_HOST, DB_PORT, DB_NAME, DB_USER, DB_PASSWORD, DB_CHARSET
 */
export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): SqlCredentials {
  return {
    hostname: env.DB_HOST || "localhost",
    port: parseInt(env.DB_PORT || "5432", 10),
    username: env.DB_USER || "",
    password: env.DB_PASSWORD || "",
    database: env.DB_NAME || "",
    charset: env.DB_CHARSET || "UTF8",
  };
}

/**
 * Build credentials from a section of an .ini settings file
 *
 * Keys: hostname, port, username, password, database, charset. Missing keys
 * take the same defaults as loadDbConfig().
 */
export function loadDbConfigFromSettings(
  settings: ConfigurationSettings,
  section = "database"
): SqlCredentials {
  const values = settings.getSection(section);
  if (!values) {
    throw new ConfigurationError(`Configuration section not found: ${section}`);
  }

  return {
    hostname: values.hostname || "localhost",
    port: parseInt(values.port || "5432", 10),
    username: values.username || "",
    password: values.password || "",
    database: values.database || "",
    charset: values.charset || "UTF8",
  };
}

/**
 * Credentials of the current process environment
 */
export const dbConfig: SqlCredentials = loadDbConfig();
